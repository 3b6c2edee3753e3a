/**
 * Event helpers
 */

import type { Severity } from '@chargetrace/shared';
import { formatTimestamp } from './timestamp.js';
import type { TimelineEvent, TimelineRow } from './types.js';

export function createEvent(
  timestamp: Date,
  severity: Severity,
  source: string,
  message: string
): TimelineEvent {
  return { timestamp, severity, source, message, repeatCount: 1, lastSeen: timestamp };
}

/**
 * Dedup identity of an event: severity, source and normalized message
 */
export function dedupKey(severity: Severity, source: string, normalizedMessage: string): string {
  return `${severity}\t${source}\t${normalizedMessage}`;
}

/**
 * Render an event the way reports consume it
 */
export function formatEvent(event: TimelineEvent): TimelineRow {
  const message =
    event.repeatCount > 1
      ? `${event.message} (x${event.repeatCount}, last: ${formatTimestamp(event.lastSeen)})`
      : event.message;

  return {
    timestamp: formatTimestamp(event.timestamp),
    severity: event.severity,
    source: event.source,
    message,
  };
}

export function compareByTimestamp(a: { timestamp: Date }, b: { timestamp: Date }): number {
  return a.timestamp.getTime() - b.timestamp.getTime();
}
