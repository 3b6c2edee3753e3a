/**
 * Counter Store Types
 * Counters and issues produced by the pattern detectors for one station
 */

import type { Severity } from '@chargetrace/shared';

// ===========================================
// Counter Keys
// ===========================================

export const METRIC_KEYS = {
  // network
  pppStatus: 'pppStatus',
  mqttFailCount: 'mqttFailCount',
  mqttBackoffCount: 'mqttBackoffCount',
  ethFlapCycles: 'ethFlapCycles',
  // OCPP and certificates
  ocppBootNotifications: 'ocppBootNotifications',
  ocppBootAccepted: 'ocppBootAccepted',
  ocppCertIssues: 'ocppCertIssues',
  certLoadFailures: 'certLoadFailures',
  // charging hardware
  cpStateFaults: 'cpStateFaults',
  evccWatchdogCount: 'evccWatchdogCount',
  // health monitor
  rebootCount: 'rebootCount',
  bootCount: 'bootCount',
  serviceDownCount: 'serviceDownCount',
  gpioFailures: 'gpioFailures',
  emmcWear: 'emmcWear',
  storageFallback: 'storageFallback',
  fsReadOnly: 'fsReadOnly',
  // message queues
  pmqSubscriptionFailures: 'pmqSubscriptionFailures',
  pmqThreadAlarms: 'pmqThreadAlarms',
  pmqQueueOverflows: 'pmqQueueOverflows',
  // thermal
  tempCritical: 'tempCritical',
  tempDerating: 'tempDerating',
  tempMaxDerating: 'tempMaxDerating',
  // metering
  meterMissingCritical: 'meterMissingCritical',
  eichrechtTerminal: 'eichrechtTerminal',
  eichrechtUnavailable: 'eichrechtUnavailable',
  // ISO 15118
  v2gErrors: 'v2gErrors',
  v2gTimeouts: 'v2gTimeouts',
  v2gCertIssues: 'v2gCertIssues',
  // station summary
  healthScore: 'healthScore',
  firmwareVersion: 'firmwareVersion',
} as const;

export type MetricValue = number | string;

// ===========================================
// Issues
// ===========================================

export interface Issue {
  severity: Severity;
  component: string;
  title: string;
  description: string;
  evidenceRef?: string;
}

// ===========================================
// Read Access
// ===========================================

/**
 * Read-only view handed to the causal engine
 */
export interface MetricReader {
  has(key: string): boolean;
  // 0 when absent
  get(key: string): MetricValue;
  int(key: string): number;
  text(key: string): string;
}

export interface MetricSnapshot extends MetricReader {
  readonly values: Readonly<Record<string, MetricValue>>;
  readonly issues: readonly Readonly<Issue>[];
}
