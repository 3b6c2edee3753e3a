/**
 * Correlation Layer Types
 * Types for finding incidents shared by several stations of a fleet
 */

import type { Severity } from '@chargetrace/shared';
import type { TimelineEvent } from '../events/types.js';

// ===========================================
// Input
// ===========================================

export interface EntityTimeline {
  entityId: string;
  events: readonly TimelineEvent[];
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

// ===========================================
// Output
// ===========================================

export interface CorrelatedIncident {
  timestamp: Date;
  source: string;
  severity: Severity;
  messageSnippet: string;
  // Sorted, distinct
  entityIds: string[];
  count: number;
  window: TimeWindow;
}

export interface CorrelationResult {
  incidents: CorrelatedIncident[];
  mergedEvents: number;
  seeds: number;
  duplicates: number;
  subsumed: number;
}

// ===========================================
// Correlator Config
// ===========================================

export interface FleetCorrelatorConfig {
  windowSeconds: number;
  // Only events at or above this severity open a window
  minSeverity: Severity;
  snippetLength: number;
}

export const DEFAULT_CORRELATOR_CONFIG: FleetCorrelatorConfig = {
  windowSeconds: 300,
  minSeverity: 'HIGH',
  snippetLength: 60,
};
