/**
 * Fleet Analysis
 */

export * from './types.js';
export { FleetAnalyzer } from './fleet-analyzer.js';
export {
  classifyHealth,
  firmwareVersionOf,
  findIssuePatterns,
  firmwareDistribution,
  summarizeFleet,
} from './fleet-summary.js';
