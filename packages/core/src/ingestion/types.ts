/**
 * Ingestion Layer Types
 * Boundary types between the external log parsers and the timeline builder
 */

// ===========================================
// Line Tuples
// ===========================================

/**
 * One pre-parsed log line. Fields are left raw; the timeline builder
 * validates and repairs them.
 */
export interface LineTuple {
  rawTimestamp: string;
  severityCode: string;
  component: string;
  message: string;
}

/**
 * `component` streams come from a dedicated component log;
 * `system` streams (syslog, kern.log) may repeat their output.
 */
export type StreamKind = 'component' | 'system';

export interface LineStream {
  name: string;
  kind: StreamKind;
  lines: LineTuple[];
}

// ===========================================
// Reader Types
// ===========================================

export type LineFormat = 'parsed' | 'app' | 'auto';

export interface LineStreamReadResult {
  stream: LineStream;
  format: Exclude<LineFormat, 'auto'>;
  // Non-blank lines that fit neither shape
  rejected: number;
}
