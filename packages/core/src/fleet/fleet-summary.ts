/**
 * Fleet Summary
 * Health classification, shared issue patterns and firmware spread across stations
 */

import type { Severity } from '@chargetrace/shared';
import type { MetricStore } from '../metrics/metric-store.js';
import { METRIC_KEYS } from '../metrics/types.js';
import type {
  CompletedStation,
  FirmwareShare,
  FleetSummary,
  IssuePattern,
  StationHealth,
  StationOutcome,
} from './types.js';

const DEFAULT_HEALTH_SCORE = 100;
const DEGRADED_BELOW = 50;

export function classifyHealth(metrics: MetricStore): Exclude<StationHealth, 'error'> {
  const counts = metrics.issueCountBySeverity();
  if (counts.CRITICAL > 0) {
    return 'critical';
  }
  const score = metrics.has(METRIC_KEYS.healthScore)
    ? metrics.int(METRIC_KEYS.healthScore)
    : DEFAULT_HEALTH_SCORE;
  if (counts.HIGH > 0 || score < DEGRADED_BELOW) {
    return 'degraded';
  }
  return 'healthy';
}

export function firmwareVersionOf(metrics: MetricStore): string | null {
  if (!metrics.has(METRIC_KEYS.firmwareVersion)) {
    return null;
  }
  const version = metrics.text(METRIC_KEYS.firmwareVersion).trim();
  return version === '' || version.toLowerCase() === 'unknown' ? null : version;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Issue titles by the number of distinct stations reporting them
 */
export function findIssuePatterns(stations: readonly CompletedStation[]): IssuePattern[] {
  const byTitle = new Map<string, { severity: Severity; entityIds: Set<string> }>();

  for (const station of stations) {
    for (const issue of station.input.metrics.issues()) {
      const entry = byTitle.get(issue.title);
      if (entry) {
        entry.entityIds.add(station.entityId);
      } else {
        byTitle.set(issue.title, { severity: issue.severity, entityIds: new Set([station.entityId]) });
      }
    }
  }

  return [...byTitle.entries()]
    .map(([title, { severity, entityIds }]) => ({
      title,
      severity,
      stationCount: entityIds.size,
      entityIds: [...entityIds].sort(),
      scope: entityIds.size >= 2 ? ('shared' as const) : ('unique' as const),
    }))
    .sort((a, b) => b.stationCount - a.stationCount || compareText(a.title, b.title));
}

export function firmwareDistribution(stations: readonly CompletedStation[]): FirmwareShare[] {
  const counts = new Map<string, number>();
  for (const station of stations) {
    if (station.firmwareVersion) {
      counts.set(station.firmwareVersion, (counts.get(station.firmwareVersion) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([version, stations]) => ({ version, stations }))
    .sort((a, b) => b.stations - a.stations || compareText(a.version, b.version));
}

export function summarizeFleet(outcomes: readonly StationOutcome[]): FleetSummary {
  const completed = outcomes.filter((o): o is CompletedStation => o.status === 'completed');
  const health: Record<StationHealth, number> = { healthy: 0, degraded: 0, critical: 0, error: 0 };
  for (const outcome of outcomes) {
    health[outcome.health]++;
  }

  return {
    stations: outcomes.length,
    completed: completed.length,
    failed: outcomes.length - completed.length,
    health,
    issuePatterns: findIssuePatterns(completed),
    firmware: firmwareDistribution(completed),
  };
}
