/**
 * Timeline Layer
 */

export * from './types.js';
export { TimelineBuilder } from './timeline-builder.js';
export { ErrorHistogramAnalyzer } from './error-histogram.js';
