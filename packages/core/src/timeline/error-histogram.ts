/**
 * Error Histogram
 * Hourly event counts per severity with peak and spike detection
 */

import { createChildLogger, type Severity } from '@chargetrace/shared';
import { formatHourBucket } from '../events/timestamp.js';
import type { TimelineEvent } from '../events/types.js';
import {
  DEFAULT_HISTOGRAM_CONFIG,
  type ErrorHistogram,
  type ErrorHistogramConfig,
  type HistogramBucket,
  type HistogramSpike,
} from './types.js';

function emptyCounts(): Record<Severity, number> {
  return { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFO: 0 };
}

export class ErrorHistogramAnalyzer {
  private logger = createChildLogger({ component: 'ErrorHistogram' });
  private config: ErrorHistogramConfig;

  constructor(config: Partial<ErrorHistogramConfig> = {}) {
    this.config = { ...DEFAULT_HISTOGRAM_CONFIG, ...config };
  }

  /**
   * Bucket events by hour. Each event counts once regardless of repeatCount.
   */
  analyze(events: readonly TimelineEvent[]): ErrorHistogram {
    const byBucket = new Map<string, HistogramBucket>();

    for (const event of events) {
      const label = formatHourBucket(event.timestamp);
      let bucket = byBucket.get(label);
      if (!bucket) {
        bucket = { bucket: label, total: 0, counts: emptyCounts() };
        byBucket.set(label, bucket);
      }
      bucket.total++;
      bucket.counts[event.severity]++;
    }

    const buckets = [...byBucket.values()];
    const peak = this.findPeak(buckets);
    const total = buckets.reduce((sum, b) => sum + b.total, 0);
    const average = buckets.length > 0 ? total / buckets.length : 0;
    const spikes = this.findSpikes(buckets, average);

    if (spikes.length > 0) {
      this.logger.debug({ spikes: spikes.length, peak: peak?.bucket }, 'Error spikes detected');
    }

    return { buckets, peak, average, spikes };
  }

  private findPeak(buckets: HistogramBucket[]): HistogramBucket | null {
    let peak: HistogramBucket | null = null;
    for (const bucket of buckets) {
      if (!peak || bucket.total > peak.total) {
        peak = bucket;
      }
    }
    return peak;
  }

  private findSpikes(buckets: HistogramBucket[], average: number): HistogramSpike[] {
    if (buckets.length < 2 || average < 1) {
      return [];
    }
    const threshold = average * this.config.spikeFactor;
    return buckets
      .filter((b) => b.total > threshold)
      .map((b) => ({ bucket: b.bucket, total: b.total, ratio: b.total / average }));
  }
}
