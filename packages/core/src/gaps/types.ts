/**
 * Gap Detection Types
 */

export interface GapRecord {
  fromTimestamp: Date;
  toTimestamp: Date;
  durationSeconds: number;
  fromSource: string;
  toSource: string;
}

export interface GapDetectorConfig {
  // A gap must be strictly longer than this
  thresholdSeconds: number;
}

export const DEFAULT_GAP_CONFIG: GapDetectorConfig = {
  thresholdSeconds: 300,
};
