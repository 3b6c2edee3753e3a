/**
 * Station Analysis Types
 */

import type { CausalRule, EngineResult } from '../causal/types.js';
import type { FleetCorrelatorConfig } from '../correlation/types.js';
import type { TimelineEvent, TimelineRow } from '../events/types.js';
import type { GapDetectorConfig, GapRecord } from '../gaps/types.js';
import type { LineStream } from '../ingestion/types.js';
import type { MetricStore } from '../metrics/metric-store.js';
import type {
  BuildStats,
  ErrorHistogram,
  ErrorHistogramConfig,
  TimelineBuilderConfig,
} from '../timeline/types.js';

// ===========================================
// Input
// ===========================================

export interface StationInput {
  entityId: string;
  streams: LineStream[];
  // Counters and issues from the pattern detectors; read only here
  metrics: MetricStore;
}

// ===========================================
// Report
// ===========================================

export interface StationStats extends BuildStats {
  rulesSkipped: number;
  rulesSuppressed: number;
  durationMs: number;
}

export interface StationReport {
  entityId: string;
  timeline: TimelineEvent[];
  rows: TimelineRow[];
  gaps: GapRecord[];
  longestGap: GapRecord | null;
  histogram: ErrorHistogram;
  causal: EngineResult;
  stats: StationStats;
}

// ===========================================
// Options
// ===========================================

export interface StationAnalysisOptions {
  timeline: Partial<TimelineBuilderConfig>;
  gaps: Partial<GapDetectorConfig>;
  histogram: Partial<ErrorHistogramConfig>;
  rules?: readonly CausalRule[];
}

export interface AnalysisOptions extends StationAnalysisOptions {
  correlator: Partial<FleetCorrelatorConfig>;
  maxConcurrency: number;
}
