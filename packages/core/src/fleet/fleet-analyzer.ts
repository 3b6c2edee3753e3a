/**
 * Fleet Analyzer
 * Runs station pipelines in a bounded pool, then correlates the stations that completed
 */

import { EventEmitter } from 'eventemitter3';
import {
  createChildLogger,
  StationAnalysisError,
  wrapError,
} from '@chargetrace/shared';
import { StationAnalyzer } from '../analysis/station-analyzer.js';
import type { AnalysisOptions, StationInput } from '../analysis/types.js';
import { FleetCorrelator } from '../correlation/fleet-correlator.js';
import type { CorrelationResult } from '../correlation/types.js';
import { classifyHealth, firmwareVersionOf, summarizeFleet } from './fleet-summary.js';
import type {
  CompletedStation,
  FleetAnalyzerEvents,
  FleetReport,
  FleetRunOptions,
  StationOutcome,
  StationSource,
} from './types.js';

const DEFAULT_MAX_CONCURRENCY = 4;

export class FleetAnalyzer extends EventEmitter<FleetAnalyzerEvents> {
  private logger = createChildLogger({ component: 'FleetAnalyzer' });
  private stationAnalyzer: StationAnalyzer;
  private correlator: FleetCorrelator;
  private maxConcurrency: number;
  private activeStations: Set<string> = new Set();

  constructor(options: Partial<AnalysisOptions> = {}) {
    super();
    this.stationAnalyzer = new StationAnalyzer(options);
    this.correlator = new FleetCorrelator(options.correlator);
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
  }

  /**
   * Analyse every station, at most `maxConcurrency` at a time. A failing station is
   * reported and left out of correlation; it never fails the run.
   */
  async analyze(sources: readonly StationSource[], options: FleetRunOptions = {}): Promise<FleetReport> {
    const started = Date.now();
    const { signal } = options;
    const outcomes: Array<StationOutcome | undefined> = [];
    let cursor = 0;

    const lane = async (): Promise<void> => {
      while (cursor < sources.length && !signal?.aborted) {
        const position = cursor++;
        const source = sources[position];
        if (source) {
          outcomes[position] = await this.runStation(source);
        }
      }
    };

    const lanes = Math.min(this.maxConcurrency, sources.length);
    await Promise.all(Array.from({ length: lanes }, lane));

    // Partial fleets are discarded rather than correlated
    signal?.throwIfAborted();

    const stations = outcomes.filter((o): o is StationOutcome => o !== undefined);
    const completed = stations.filter((o): o is CompletedStation => o.status === 'completed');

    let correlation: CorrelationResult | null = null;
    if (completed.length >= 2) {
      correlation = this.correlator.correlate(
        completed.map((station) => ({ entityId: station.entityId, events: station.report.timeline }))
      );
    }

    const summary = summarizeFleet(stations);
    const durationMs = Date.now() - started;
    this.logger.info({
      stations: summary.stations,
      completed: summary.completed,
      failed: summary.failed,
      incidents: correlation?.incidents.length ?? 0,
      durationMs,
    }, 'Fleet analysis complete');

    return { stations, correlation, summary, durationMs };
  }

  getActiveStations(): string[] {
    return [...this.activeStations];
  }

  private async runStation(source: StationSource): Promise<StationOutcome> {
    const { entityId } = source;
    this.activeStations.add(entityId);
    this.logger.debug({ entityId, active: this.activeStations.size }, 'Station started');

    let outcome: StationOutcome;
    try {
      const input: StationInput = 'load' in source ? { entityId, ...(await source.load()) } : source;
      const report = this.stationAnalyzer.analyze(input);
      outcome = {
        entityId,
        status: 'completed',
        health: classifyHealth(input.metrics),
        firmwareVersion: firmwareVersionOf(input.metrics),
        report,
        input,
      };
    } catch (error) {
      const cause = wrapError(error, { entityId });
      outcome = {
        entityId,
        status: 'failed',
        health: 'error',
        error: new StationAnalysisError(entityId, cause.message, { originalCode: cause.code }),
      };
    } finally {
      this.activeStations.delete(entityId);
    }

    if (outcome.status === 'completed') {
      this.emit('stationCompleted', outcome.report);
    } else {
      this.logger.error({ entityId, error: outcome.error.message }, 'Station analysis failed');
      this.emit('stationFailed', entityId, outcome.error);
    }
    return outcome;
  }
}
