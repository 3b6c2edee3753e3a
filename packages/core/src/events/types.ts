/**
 * Event Model Types
 * The canonical record flowing through timeline, gap, causal and fleet layers
 */

import type { Severity } from '@chargetrace/shared';

// ===========================================
// Timeline Event
// ===========================================

export interface TimelineEvent {
  timestamp: Date;
  severity: Severity;
  source: string;
  // Display text; redundant component/level prefixes already stripped
  message: string;
  // Raw lines folded into this event by deduplication (>= 1)
  repeatCount: number;
  // Most recent folded occurrence (>= timestamp)
  lastSeen: Date;
}

/**
 * Event tagged with the station it came from (fleet mode)
 */
export interface EntityEvent extends TimelineEvent {
  entityId: string;
}

/**
 * Flat row handed to report generators
 */
export interface TimelineRow {
  timestamp: string;
  severity: Severity;
  source: string;
  message: string;
}

// ===========================================
// Helper Types
// ===========================================

export type TimestampParseResult =
  | { ok: true; time: Date }
  | { ok: false };

export interface NormalizeOptions {
  minDigitRun: number;
}

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  minDigitRun: 3,
};
