/**
 * Gap Detection
 */

export * from './types.js';
export { GapDetector } from './gap-detector.js';
