/**
 * Map validated environment configuration onto analysis options
 */

import type { Config } from '@chargetrace/shared';
import type { AnalysisOptions } from './types.js';

export function analysisOptionsFromConfig(config: Config): AnalysisOptions {
  return {
    timeline: {
      minSeverity: config.timeline.minSeverity,
      placeholderComponents: config.timeline.placeholderComponents,
      dedupMinDigitRun: config.timeline.dedupMinDigitRun,
    },
    gaps: { thresholdSeconds: config.gaps.thresholdSeconds },
    histogram: { spikeFactor: config.histogram.spikeFactor },
    correlator: {
      windowSeconds: config.fleet.windowSeconds,
      minSeverity: config.fleet.minSeverity,
      snippetLength: config.fleet.snippetLength,
    },
    maxConcurrency: config.fleet.maxConcurrency,
  };
}
