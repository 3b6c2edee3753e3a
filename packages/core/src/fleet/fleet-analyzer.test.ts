/**
 * FleetAnalyzer Tests
 */
import { describe, it, expect, vi } from 'vitest';
import { StationAnalysisError } from '@chargetrace/shared';
import { FleetAnalyzer } from './fleet-analyzer.js';
import type { StationInput } from '../analysis/types.js';
import type { LineStream } from '../ingestion/types.js';
import { MetricStore } from '../metrics/metric-store.js';
import { METRIC_KEYS } from '../metrics/types.js';
import type { StationLoader } from './types.js';

function ocppFailureAt(time: string): LineStream {
  return {
    name: 'ocpp',
    kind: 'component',
    lines: [
      {
        rawTimestamp: `2026-02-18 ${time}.000`,
        severityCode: 'E',
        component: 'OCPP',
        message: 'WebSocket failed',
      },
    ],
  };
}

function station(entityId: string, time: string, metrics: MetricStore = new MetricStore()): StationInput {
  return { entityId, streams: [ocppFailureAt(time)], metrics };
}

function delayed(entityId: string, time: string, onLoad: () => void, onDone: () => void): StationLoader {
  return {
    entityId,
    load: async () => {
      onLoad();
      await new Promise((resolve) => setTimeout(resolve, 5));
      onDone();
      return { streams: [ocppFailureAt(time)], metrics: new MetricStore() };
    },
  };
}

describe('FleetAnalyzer', () => {
  describe('analyze()', () => {
    it('should analyse each station and correlate shared incidents', async () => {
      const analyzer = new FleetAnalyzer();
      const completed = vi.fn();
      analyzer.on('stationCompleted', completed);

      const report = await analyzer.analyze([
        station('CP-A', '09:00:00'),
        station('CP-B', '09:02:00'),
        station('CP-C', '09:04:30'),
      ]);

      expect(report.stations.map((s) => [s.entityId, s.status])).toEqual([
        ['CP-A', 'completed'],
        ['CP-B', 'completed'],
        ['CP-C', 'completed'],
      ]);
      expect(report.correlation?.incidents.map((i) => i.entityIds)).toEqual([['CP-A', 'CP-B', 'CP-C']]);
      expect(completed).toHaveBeenCalledTimes(3);
    });

    it('should isolate a failing station', async () => {
      const analyzer = new FleetAnalyzer();
      const failed = vi.fn();
      analyzer.on('stationFailed', failed);

      const report = await analyzer.analyze([
        station('CP-A', '09:00:00'),
        {
          entityId: 'CP-X',
          load: async () => {
            throw new Error('archive missing');
          },
        },
        station('CP-B', '09:01:00'),
      ]);

      const broken = report.stations[1]!;
      expect(broken.status).toBe('failed');
      if (broken.status === 'failed') {
        expect(broken.error).toBeInstanceOf(StationAnalysisError);
        expect(broken.error.message).toBe("Station 'CP-X' analysis failed: archive missing");
      }
      expect(failed).toHaveBeenCalledWith('CP-X', expect.any(StationAnalysisError));
      expect(report.correlation?.incidents.map((i) => i.entityIds)).toEqual([['CP-A', 'CP-B']]);
      expect(report.summary.health.error).toBe(1);
    });

    it('should skip correlation with fewer than two completed stations', async () => {
      const report = await new FleetAnalyzer().analyze([station('CP-A', '09:00:00')]);

      expect(report.correlation).toBeNull();
    });

    it('should never run more stations at once than allowed', async () => {
      let running = 0;
      let peak = 0;
      const start = () => {
        running++;
        peak = Math.max(peak, running);
      };
      const finish = () => {
        running--;
      };
      const analyzer = new FleetAnalyzer({ maxConcurrency: 2 });

      const report = await analyzer.analyze(
        ['CP-1', 'CP-2', 'CP-3', 'CP-4', 'CP-5'].map((id) => delayed(id, '09:00:00', start, finish))
      );

      expect(peak).toBe(2);
      expect(report.summary.completed).toBe(5);
      expect(report.stations.map((s) => s.entityId)).toEqual(['CP-1', 'CP-2', 'CP-3', 'CP-4', 'CP-5']);
      expect(analyzer.getActiveStations()).toEqual([]);
    });

    it('should discard an aborted run', async () => {
      const controller = new AbortController();
      controller.abort(new Error('cancelled'));
      const completed = vi.fn();
      const analyzer = new FleetAnalyzer();
      analyzer.on('stationCompleted', completed);

      await expect(
        analyzer.analyze([station('CP-A', '09:00:00'), station('CP-B', '09:00:30')], { signal: controller.signal })
      ).rejects.toThrow('cancelled');
      expect(completed).not.toHaveBeenCalled();
    });

    it('should summarise health, shared issues and firmware', async () => {
      const critical = new MetricStore({ [METRIC_KEYS.firmwareVersion]: '7.4.1' });
      critical.addIssue({ severity: 'CRITICAL', component: 'Meter', title: 'Meter missing', description: 'a' });
      critical.addIssue({ severity: 'LOW', component: 'HMI', title: 'Display timeout', description: 'b' });

      const degraded = new MetricStore({ [METRIC_KEYS.firmwareVersion]: '7.4.1' });
      degraded.addIssue({ severity: 'HIGH', component: 'Meter', title: 'Meter missing', description: 'c' });

      const lowScore = new MetricStore({
        [METRIC_KEYS.healthScore]: 40,
        [METRIC_KEYS.firmwareVersion]: '7.3.0',
      });
      const healthy = new MetricStore({ [METRIC_KEYS.firmwareVersion]: 'unknown' });

      const report = await new FleetAnalyzer().analyze([
        station('CP-A', '09:00:00', critical),
        station('CP-B', '10:00:00', degraded),
        station('CP-C', '11:00:00', lowScore),
        station('CP-D', '12:00:00', healthy),
      ]);

      expect(report.stations.map((s) => s.health)).toEqual(['critical', 'degraded', 'degraded', 'healthy']);
      expect(report.summary.health).toEqual({ healthy: 1, degraded: 2, critical: 1, error: 0 });
      expect(report.summary.issuePatterns).toEqual([
        {
          title: 'Meter missing',
          severity: 'CRITICAL',
          stationCount: 2,
          entityIds: ['CP-A', 'CP-B'],
          scope: 'shared',
        },
        {
          title: 'Display timeout',
          severity: 'LOW',
          stationCount: 1,
          entityIds: ['CP-A'],
          scope: 'unique',
        },
      ]);
      expect(report.summary.firmware).toEqual([
        { version: '7.4.1', stations: 2 },
        { version: '7.3.0', stations: 1 },
      ]);
      expect(report.correlation?.incidents).toEqual([]);
    });
  });
});
