/**
 * Causal Chain Inference
 */

export * from './types.js';
export { CAUSAL_RULES, WEAR_BEFORE_FALLBACK, METER_BEFORE_EICHRECHT } from './rules.js';
export { TemporalIndex } from './temporal-index.js';
export { CausalChainEngine, orderSteps } from './causal-chain-engine.js';
