/**
 * @chargetrace/core
 * Timeline construction, gap detection, causal inference and fleet correlation
 */

// Event model
export * from './events/index.js';

// Ingestion Layer - line tuples from extracted logs
export * from './ingestion/index.js';

// Timeline Layer - merge, recovery, dedup and hourly histogram
export * from './timeline/index.js';

// Gap Detection
export * from './gaps/index.js';

// Counter Store
export * from './metrics/index.js';

// Causal Chain Inference
export * from './causal/index.js';

// Correlation Layer - cross-station incidents
export * from './correlation/index.js';

// ============================================
// Pipelines
// ============================================

// Per-station analysis
export * from './analysis/index.js';

// Fleet analysis
export * from './fleet/index.js';
