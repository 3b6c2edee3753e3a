/**
 * Core types for ChargeTrace
 */

export * from './severity.js';
