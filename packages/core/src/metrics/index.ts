/**
 * Counter Store
 */

export * from './types.js';
export { MetricStore } from './metric-store.js';
