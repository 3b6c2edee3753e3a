/**
 * Message normalization for dedup keys.
 * The normalized form is only ever compared, never displayed.
 */

import { DEFAULT_NORMALIZE_OPTIONS, type NormalizeOptions } from './types.js';

const HEX_LITERAL = /0x[0-9a-fA-F]+/g;
const JWT_TOKEN = /[A-Za-z0-9_-]{40,}\.[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_=-]{20,}/g;
const BASE64_RUN = /[A-Za-z0-9+/=]{32,}/g;
const WHITESPACE = /\s+/g;

// Suffix added to display text of a collapsed event
export const REPEAT_ANNOTATION = / \(x\d+, last: [^)]+\)/g;

const digitPatternCache = new Map<number, RegExp>();

function digitRunPattern(minDigitRun: number): RegExp {
  let pattern = digitPatternCache.get(minDigitRun);
  if (!pattern) {
    pattern = new RegExp(`[0-9]{${minDigitRun},}`, 'g');
    digitPatternCache.set(minDigitRun, pattern);
  }
  return pattern;
}

export function normalize(message: string, options: Partial<NormalizeOptions> = {}): string {
  const { minDigitRun } = { ...DEFAULT_NORMALIZE_OPTIONS, ...options };

  // Digit runs go first, so `0x1234` keys as `0xN` and stays apart from `0xABCD`
  return message
    .replace(digitRunPattern(minDigitRun), 'N')
    .replace(HEX_LITERAL, '0xH')
    .replace(JWT_TOKEN, 'JWT')
    .replace(BASE64_RUN, 'B64')
    .replace(WHITESPACE, ' ')
    .trim();
}

/**
 * Remove a previously rendered `(xN, last: …)` suffix
 */
export function stripRepeatAnnotation(message: string): string {
  return message.replace(REPEAT_ANNOTATION, '');
}
