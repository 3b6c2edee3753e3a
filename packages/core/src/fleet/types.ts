/**
 * Fleet Analysis Types
 */

import type { ChargeTraceError, Severity } from '@chargetrace/shared';
import type { StationInput, StationReport } from '../analysis/types.js';
import type { CorrelationResult } from '../correlation/types.js';

// ===========================================
// Input
// ===========================================

/**
 * A station whose streams and counters are loaded when its turn in the pool comes
 */
export interface StationLoader {
  entityId: string;
  load: () => Promise<Omit<StationInput, 'entityId'>>;
}

export type StationSource = StationInput | StationLoader;

export interface FleetRunOptions {
  signal?: AbortSignal;
}

// ===========================================
// Station Outcomes
// ===========================================

export type StationHealth = 'healthy' | 'degraded' | 'critical' | 'error';

export interface CompletedStation {
  entityId: string;
  status: 'completed';
  health: Exclude<StationHealth, 'error'>;
  firmwareVersion: string | null;
  report: StationReport;
  input: StationInput;
}

export interface FailedStation {
  entityId: string;
  status: 'failed';
  health: 'error';
  error: ChargeTraceError;
}

export type StationOutcome = CompletedStation | FailedStation;

// ===========================================
// Fleet Summary
// ===========================================

export interface IssuePattern {
  title: string;
  // Severity of the first sighting
  severity: Severity;
  stationCount: number;
  entityIds: string[];
  scope: 'shared' | 'unique';
}

export interface FirmwareShare {
  version: string;
  stations: number;
}

export interface FleetSummary {
  stations: number;
  completed: number;
  failed: number;
  health: Record<StationHealth, number>;
  issuePatterns: IssuePattern[];
  firmware: FirmwareShare[];
}

export interface FleetReport {
  stations: StationOutcome[];
  // null when fewer than two stations completed
  correlation: CorrelationResult | null;
  summary: FleetSummary;
  durationMs: number;
}

// ===========================================
// Events
// ===========================================

export interface FleetAnalyzerEvents {
  stationCompleted: (report: StationReport) => void;
  stationFailed: (entityId: string, error: ChargeTraceError) => void;
}
