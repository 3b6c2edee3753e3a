/**
 * Station Analyzer
 * Per-station pipeline: timeline first, then gaps, histogram and causal chains
 */

import { createChildLogger, logStationAnalysis } from '@chargetrace/shared';
import { CausalChainEngine } from '../causal/causal-chain-engine.js';
import { formatEvent } from '../events/event.js';
import { GapDetector } from '../gaps/gap-detector.js';
import { ErrorHistogramAnalyzer } from '../timeline/error-histogram.js';
import { TimelineBuilder } from '../timeline/timeline-builder.js';
import type { StationAnalysisOptions, StationInput, StationReport } from './types.js';

export class StationAnalyzer {
  private logger = createChildLogger({ component: 'StationAnalyzer' });
  private builder: TimelineBuilder;
  private gapDetector: GapDetector;
  private histogram: ErrorHistogramAnalyzer;
  private engine: CausalChainEngine;

  constructor(options: Partial<StationAnalysisOptions> = {}) {
    this.builder = new TimelineBuilder(options.timeline);
    this.gapDetector = new GapDetector(options.gaps);
    this.histogram = new ErrorHistogramAnalyzer(options.histogram);
    this.engine = new CausalChainEngine(options.rules);
  }

  analyze(input: StationInput): StationReport {
    const started = Date.now();
    const { entityId } = input;

    // The timeline must be complete before anything reads its order
    const { events, stats } = this.builder.build(input.streams);

    const gaps = this.gapDetector.detect(events);
    const histogram = this.histogram.analyze(events);
    const causal = this.engine.evaluate(input.metrics.snapshot(), events);

    const durationMs = Date.now() - started;
    logStationAnalysis(entityId, events.length, stats.dropped, causal.chains.length, durationMs);
    if (causal.skipped.length > 0) {
      this.logger.warn(
        { entityId, rules: causal.skipped.map((s) => s.ruleId) },
        'Causal rules skipped for station'
      );
    }

    return {
      entityId,
      timeline: events,
      rows: events.map(formatEvent),
      gaps,
      longestGap: gaps[0] ?? null,
      histogram,
      causal,
      stats: {
        ...stats,
        rulesSkipped: causal.skipped.length,
        rulesSuppressed: causal.suppressed,
        durationMs,
      },
    };
  }
}
