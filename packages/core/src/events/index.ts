/**
 * Event Model
 * Canonical timeline record plus normalization and timestamp helpers
 */

export * from './types.js';
export { createEvent, dedupKey, formatEvent, compareByTimestamp } from './event.js';
export { normalize, stripRepeatAnnotation } from './normalize.js';
export {
  parseTimestamp,
  formatTimestamp,
  formatHourBucket,
  isSentinelTimestamp,
  toEpochSeconds,
  EMBEDDED_TIMESTAMP,
} from './timestamp.js';
