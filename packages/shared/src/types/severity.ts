/**
 * Severity model shared by every ChargeTrace layer
 */

export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO'] as const;

export type Severity = (typeof SEVERITIES)[number];

const SEVERITY_RANK: Record<Severity, number> = {
  CRITICAL: 5,
  HIGH: 4,
  MEDIUM: 3,
  LOW: 2,
  INFO: 1,
};

// Level codes emitted by the ingestion layer: E=error, C=critical, W=warning, I=info, N=notice
export type SeverityCode = 'I' | 'W' | 'E' | 'C' | 'N';

export const SEVERITY_CODE_MAP: Record<SeverityCode, Severity> = {
  E: 'HIGH',
  C: 'CRITICAL',
  W: 'MEDIUM',
  I: 'INFO',
  N: 'INFO',
};

export function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}

export function isSeverityCode(value: string): value is SeverityCode {
  return Object.prototype.hasOwnProperty.call(SEVERITY_CODE_MAP, value);
}

/**
 * True when `severity` is at or above `floor`
 */
export function isAtLeast(severity: Severity, floor: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[floor];
}

/**
 * Comparator placing the most severe first
 */
export function compareSeverityDesc(a: Severity, b: Severity): number {
  return SEVERITY_RANK[b] - SEVERITY_RANK[a];
}

/**
 * Map an ingest level code to a severity; null for codes outside the set
 */
export function parseSeverityCode(code: string): Severity | null {
  return isSeverityCode(code) ? SEVERITY_CODE_MAP[code] : null;
}
