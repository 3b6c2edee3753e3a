/**
 * Correlation Layer
 * Cross-station incident correlation for fleet runs
 */

export * from './types.js';
export { FleetCorrelator } from './fleet-correlator.js';
