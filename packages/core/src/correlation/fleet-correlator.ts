/**
 * Fleet Correlator
 * Finds significant events that several stations report within one time window
 */

import { createChildLogger, isAtLeast } from '@chargetrace/shared';
import { compareByTimestamp } from '../events/event.js';
import type { EntityEvent } from '../events/types.js';
import {
  DEFAULT_CORRELATOR_CONFIG,
  type CorrelatedIncident,
  type CorrelationResult,
  type EntityTimeline,
  type FleetCorrelatorConfig,
} from './types.js';

function minuteOf(time: Date): number {
  return Math.floor(time.getTime() / 60_000);
}

// Cut by code point so surrogate pairs stay whole
function snippet(message: string, length: number): string {
  return Array.from(message).slice(0, length).join('');
}

function isSubset(candidate: readonly string[], of: readonly string[]): boolean {
  return candidate.every((id) => of.includes(id));
}

export class FleetCorrelator {
  private logger = createChildLogger({ component: 'FleetCorrelator' });
  private config: FleetCorrelatorConfig;

  constructor(config: Partial<FleetCorrelatorConfig> = {}) {
    this.config = { ...DEFAULT_CORRELATOR_CONFIG, ...config };
  }

  /**
   * Stable merge of every station timeline; ties keep input order
   */
  merge(timelines: readonly EntityTimeline[]): EntityEvent[] {
    const merged: EntityEvent[] = [];
    for (const { entityId, events } of timelines) {
      for (const event of events) {
        merged.push({ ...event, entityId });
      }
    }
    return merged.sort(compareByTimestamp);
  }

  correlate(timelines: readonly EntityTimeline[]): CorrelationResult {
    const events = this.merge(timelines);
    const windowMs = this.config.windowSeconds * 1000;
    const result: CorrelationResult = {
      incidents: [],
      mergedEvents: events.length,
      seeds: 0,
      duplicates: 0,
      subsumed: 0,
    };

    const seen = new Set<string>();
    // Per-entity counts over events (seed, end)
    const inWindow = new Map<string, number>();
    let end = 0;

    for (let i = 0; i < events.length; i++) {
      const seed = events[i];
      if (!seed) {
        continue;
      }

      if (i < end) {
        this.release(inWindow, seed.entityId);
      } else {
        end = i + 1;
      }

      const limit = seed.timestamp.getTime() + windowMs;
      while (end < events.length) {
        const next = events[end];
        if (!next || next.timestamp.getTime() > limit) {
          break;
        }
        inWindow.set(next.entityId, (inWindow.get(next.entityId) ?? 0) + 1);
        end++;
      }

      if (!isAtLeast(seed.severity, this.config.minSeverity)) {
        continue;
      }
      result.seeds++;

      const entityIds = [...new Set([seed.entityId, ...inWindow.keys()])].sort();
      if (entityIds.length < 2) {
        continue;
      }

      const key = `${minuteOf(seed.timestamp)}\t${seed.source}\t${entityIds.join(',')}`;
      if (seen.has(key)) {
        result.duplicates++;
        continue;
      }
      if (this.isSubsumed(result.incidents, seed, entityIds)) {
        result.subsumed++;
        continue;
      }

      seen.add(key);
      result.incidents.push({
        timestamp: seed.timestamp,
        source: seed.source,
        severity: seed.severity,
        messageSnippet: snippet(seed.message, this.config.snippetLength),
        entityIds,
        count: entityIds.length,
        window: { start: seed.timestamp, end: new Date(limit) },
      });
    }

    this.logger.info({
      stations: timelines.length,
      mergedEvents: result.mergedEvents,
      incidents: result.incidents.length,
    }, 'Fleet correlation complete');

    return result;
  }

  private release(counts: Map<string, number>, entityId: string): void {
    const remaining = (counts.get(entityId) ?? 0) - 1;
    if (remaining > 0) {
      counts.set(entityId, remaining);
    } else {
      counts.delete(entityId);
    }
  }

  /**
   * Already covered by an earlier incident from the same source whose window is still open
   */
  private isSubsumed(incidents: readonly CorrelatedIncident[], seed: EntityEvent, entityIds: string[]): boolean {
    return incidents.some(
      (incident) =>
        incident.source === seed.source &&
        seed.timestamp.getTime() <= incident.window.end.getTime() &&
        isSubset(entityIds, incident.entityIds)
    );
  }
}
