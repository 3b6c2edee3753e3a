/**
 * StationAnalyzer Tests
 */
import { describe, it, expect } from 'vitest';
import { StationAnalyzer } from './station-analyzer.js';
import { MetricStore } from '../metrics/metric-store.js';
import { METRIC_KEYS } from '../metrics/types.js';
import type { CausalRule } from '../causal/types.js';
import type { LineStream } from '../ingestion/types.js';

const ocppStream: LineStream = {
  name: 'ocpp',
  kind: 'component',
  lines: [
    { rawTimestamp: '2026-02-18 10:00:00.000', severityCode: 'E', component: 'OCPP', message: 'WebSocket failed' },
    { rawTimestamp: '2026-02-18 10:00:00.000', severityCode: 'E', component: 'OCPP', message: 'WebSocket failed' },
    { rawTimestamp: '2026-02-18 10:20:00.000', severityCode: 'W', component: 'OCPP', message: 'Heartbeat late' },
    { rawTimestamp: 'garbage', severityCode: 'E', component: 'OCPP', message: 'dropped' },
  ],
};

describe('StationAnalyzer', () => {
  describe('analyze()', () => {
    it('should run every stage over one station', () => {
      const metrics = new MetricStore({
        [METRIC_KEYS.pppStatus]: 'down',
        [METRIC_KEYS.mqttFailCount]: 5,
      });

      const report = new StationAnalyzer().analyze({ entityId: 'CP-001', streams: [ocppStream], metrics });

      expect(report.entityId).toBe('CP-001');
      expect(report.rows).toEqual([
        {
          timestamp: '2026-02-18 10:00:00.000',
          severity: 'HIGH',
          source: 'OCPP',
          message: 'WebSocket failed (x2, last: 2026-02-18 10:00:00.000)',
        },
        {
          timestamp: '2026-02-18 10:20:00.000',
          severity: 'MEDIUM',
          source: 'OCPP',
          message: 'Heartbeat late',
        },
      ]);
      expect(report.gaps).toHaveLength(1);
      expect(report.longestGap?.durationSeconds).toBe(1200);
      expect(report.histogram.buckets.map((b) => b.bucket)).toEqual(['2026-02-18 10:00']);
      expect(report.causal.chains.map((c) => c.ruleId)).toEqual(['network-cloud-cascade']);
      expect(report.stats.dropped).toBe(1);
      expect(report.stats.rulesSkipped).toBe(0);
      expect(report.stats.rulesSuppressed).toBe(0);
    });

    it('should pass options through to each stage', () => {
      const analyzer = new StationAnalyzer({
        timeline: { minSeverity: 'HIGH' },
        gaps: { thresholdSeconds: 3600 },
      });

      const report = analyzer.analyze({ entityId: 'CP-002', streams: [ocppStream], metrics: new MetricStore() });

      expect(report.timeline).toHaveLength(1);
      expect(report.stats.filtered).toBe(1);
      expect(report.gaps).toEqual([]);
      expect(report.longestGap).toBeNull();
    });

    it('should report skipped rules without failing', () => {
      const failing: CausalRule = {
        id: 'always-fails',
        name: 'Always Fails',
        severity: 'LOW',
        trigger: (m) => m.int(METRIC_KEYS.pppStatus) > 0,
        steps: () => [{ kind: 'ROOT', text: 'unreachable' }],
      };
      const metrics = new MetricStore({ [METRIC_KEYS.pppStatus]: 'down' });

      const report = new StationAnalyzer({ rules: [failing] }).analyze({
        entityId: 'CP-003',
        streams: [],
        metrics,
      });

      expect(report.timeline).toEqual([]);
      expect(report.stats.rulesSkipped).toBe(1);
      expect(report.causal.skipped[0]!.ruleId).toBe('always-fails');
    });
  });
});
