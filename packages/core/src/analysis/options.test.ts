/**
 * analysisOptionsFromConfig Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getConfig, resetConfig } from '@chargetrace/shared';
import { analysisOptionsFromConfig } from './options.js';

describe('analysisOptionsFromConfig()', () => {
  const saved = { ...process.env };

  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    process.env = { ...saved };
    resetConfig();
  });

  it('should map the environment onto stage options', () => {
    process.env.TIMELINE_PLACEHOLDER_COMPONENTS = 'generic, unknown';
    process.env.GAP_THRESHOLD_SECONDS = '600';
    process.env.FLEET_MAX_CONCURRENCY = '2';
    process.env.FLEET_MIN_SEVERITY = 'CRITICAL';

    const options = analysisOptionsFromConfig(getConfig());

    expect(options.timeline.placeholderComponents).toEqual(['generic', 'unknown']);
    expect(options.gaps).toEqual({ thresholdSeconds: 600 });
    expect(options.maxConcurrency).toBe(2);
    expect(options.correlator.minSeverity).toBe('CRITICAL');
  });

  it('should fall back to defaults', () => {
    delete process.env.GAP_THRESHOLD_SECONDS;
    delete process.env.HISTOGRAM_SPIKE_FACTOR;
    delete process.env.FLEET_WINDOW_SECONDS;

    const options = analysisOptionsFromConfig(getConfig());

    expect(options.gaps.thresholdSeconds).toBe(300);
    expect(options.histogram.spikeFactor).toBe(3);
    expect(options.correlator.windowSeconds).toBe(300);
  });
});
