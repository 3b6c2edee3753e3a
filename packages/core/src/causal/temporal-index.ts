/**
 * Temporal Index
 * First-occurrence lookups over a built timeline
 */

import type { TimelineEvent } from '../events/types.js';
import type { PrecedenceResult, TemporalPrecondition } from './types.js';

const VACUOUS: PrecedenceResult = { holds: true, confirmed: false, vacuous: true, gapMinutes: 0 };

export class TemporalIndex {
  private lines: string[];
  private firstMatch = new Map<string, number>();

  constructor(private events: readonly TimelineEvent[]) {
    // Patterns see the component as well as the message
    this.lines = events.map((event) => `${event.source}: ${event.message}`);
  }

  get size(): number {
    return this.events.length;
  }

  /**
   * Index of the first event matching `pattern`, or -1
   */
  indexOf(pattern: RegExp): number {
    const key = `${pattern.source}/${pattern.flags}`;
    const cached = this.firstMatch.get(key);
    if (cached !== undefined) {
      return cached;
    }

    // Non-global copy so lastIndex never carries over between lines
    const matcher = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
    const index = this.lines.findIndex((line) => matcher.test(line));
    this.firstMatch.set(key, index);
    return index;
  }

  /**
   * Does the first `before` match come no later than the first `after` match.
   * Missing data holds vacuously.
   */
  precedes(condition: Pick<TemporalPrecondition, 'before' | 'after' | 'measureGap'>): PrecedenceResult {
    if (this.events.length === 0) {
      return VACUOUS;
    }

    const from = this.indexOf(condition.before);
    const to = this.indexOf(condition.after);
    const fromEvent = this.events[from];
    const toEvent = this.events[to];
    if (from < 0 || to < 0 || !fromEvent || !toEvent) {
      return VACUOUS;
    }

    const holds = from <= to;
    const gapMinutes = condition.measureGap
      ? Math.trunc((toEvent.timestamp.getTime() - fromEvent.timestamp.getTime()) / 60_000)
      : 0;

    return { holds, confirmed: holds, vacuous: false, gapMinutes };
  }
}
