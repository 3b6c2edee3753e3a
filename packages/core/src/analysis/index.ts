/**
 * Station Analysis
 */

export * from './types.js';
export { StationAnalyzer } from './station-analyzer.js';
export { analysisOptionsFromConfig } from './options.js';
