/**
 * Ingestion Layer
 * Adapters from extracted log text to line tuples
 */

export * from './types.js';
export { LineStreamReader } from './line-stream-reader.js';
