/**
 * Timeline Layer Types
 * Types for building station timelines from line streams
 */

import type { MalformedLineError, MalformedLineReason, Severity } from '@chargetrace/shared';
import type { TimelineEvent } from '../events/types.js';
import type { LineTuple } from '../ingestion/types.js';

// ===========================================
// Build Result Types
// ===========================================

export interface BuildStats {
  inputLines: number;
  recoveredTimestamps: number;
  repairedComponents: number;
  // system-stream lines already covered by a dedicated component stream
  overlapSkipped: number;
  bootEvents: number;
  // below the configured severity floor
  filtered: number;
  dropped: number;
  droppedByReason: Record<MalformedLineReason, number>;
  collapsedConsecutive: number;
  collapsedGlobal: number;
  events: number;
}

export interface TimelineBuildResult {
  events: TimelineEvent[];
  stats: BuildStats;
}

// ===========================================
// Timeline Builder Config
// ===========================================

export interface TimelineBuilderConfig {
  minSeverity: Severity;
  placeholderComponents: string[];
  dedupMinDigitRun: number;
  // Year assumed for year-less syslog timestamps; defaults to the current year
  referenceYear?: number;
  detectBootEvents: boolean;
  skipSystemOverlap: boolean;
}

export const DEFAULT_TIMELINE_CONFIG: TimelineBuilderConfig = {
  minSeverity: 'INFO',
  placeholderComponents: ['generic'],
  dedupMinDigitRun: 3,
  detectBootEvents: true,
  skipSystemOverlap: true,
};

export interface TimelineBuilderEvents {
  built: (stats: BuildStats) => void;
  lineDropped: (error: MalformedLineError, tuple: LineTuple, stream: string) => void;
}

// ===========================================
// Histogram Types
// ===========================================

export interface HistogramBucket {
  bucket: string;
  total: number;
  counts: Record<Severity, number>;
}

export interface HistogramSpike {
  bucket: string;
  total: number;
  ratio: number;
}

export interface ErrorHistogram {
  buckets: HistogramBucket[];
  peak: HistogramBucket | null;
  average: number;
  spikes: HistogramSpike[];
}

export interface ErrorHistogramConfig {
  spikeFactor: number;
}

export const DEFAULT_HISTOGRAM_CONFIG: ErrorHistogramConfig = {
  spikeFactor: 3,
};
