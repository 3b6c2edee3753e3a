/**
 * Gap Detector
 * Finds silent periods between consecutive timeline events
 */

import { createChildLogger } from '@chargetrace/shared';
import { toEpochSeconds } from '../events/timestamp.js';
import type { TimelineEvent } from '../events/types.js';
import { DEFAULT_GAP_CONFIG, type GapDetectorConfig, type GapRecord } from './types.js';

const SECONDS_PER_DAY = 86_400;

export class GapDetector {
  private logger = createChildLogger({ component: 'GapDetector' });
  private config: GapDetectorConfig;

  constructor(config: Partial<GapDetectorConfig> = {}) {
    this.config = { ...DEFAULT_GAP_CONFIG, ...config };
  }

  /**
   * Gaps longer than the threshold, longest first
   */
  detect(events: readonly TimelineEvent[]): GapRecord[] {
    const gaps: GapRecord[] = [];

    for (let i = 0; i + 1 < events.length; i++) {
      const from = events[i];
      const to = events[i + 1];
      if (!from || !to) {
        continue;
      }

      let delta = toEpochSeconds(to.timestamp) - toEpochSeconds(from.timestamp);
      // Midnight wrap in clock-only sources
      if (delta < 0) {
        delta += SECONDS_PER_DAY;
      }

      if (delta > this.config.thresholdSeconds) {
        gaps.push({
          fromTimestamp: from.timestamp,
          toTimestamp: to.timestamp,
          durationSeconds: delta,
          fromSource: from.source,
          toSource: to.source,
        });
      }
    }

    gaps.sort((a, b) => b.durationSeconds - a.durationSeconds);

    if (gaps.length > 0) {
      this.logger.debug({ gaps: gaps.length, longest: gaps[0]?.durationSeconds }, 'Timeline gaps found');
    }
    return gaps;
  }

  longestGap(events: readonly TimelineEvent[]): GapRecord | null {
    return this.detect(events)[0] ?? null;
  }
}
