/**
 * Timeline Builder
 * Merges per-component line streams into one sorted, deduplicated station timeline
 */

import { EventEmitter } from 'eventemitter3';
import {
  createChildLogger,
  isAtLeast,
  MalformedLineError,
  parseSeverityCode,
  type Severity,
} from '@chargetrace/shared';
import { compareByTimestamp, createEvent, dedupKey } from '../events/event.js';
import { normalize, stripRepeatAnnotation } from '../events/normalize.js';
import { EMBEDDED_TIMESTAMP, isSentinelTimestamp, parseTimestamp } from '../events/timestamp.js';
import type { TimelineEvent } from '../events/types.js';
import type { LineStream, LineTuple } from '../ingestion/types.js';
import {
  DEFAULT_TIMELINE_CONFIG,
  type BuildStats,
  type TimelineBuildResult,
  type TimelineBuilderConfig,
  type TimelineBuilderEvents,
} from './types.js';

const LEVEL_PREFIX = /^\[(ERROR|WARNING|WARN|INFO|DEBUG|CRITICAL)\]\s*/;
const LEADING_TAG = /^\[([A-Za-z][A-Za-z0-9_ -]*)\]\s*/;
const COMPONENT_NAME = /^[A-Za-z][A-Za-z0-9_-]+$/;
const BOOT_MARKER = /Booting Linux|Linux version/;
const PID_SUFFIX = /\[.*$/;

interface TimelineEntry {
  timestamp: Date;
  severity: Severity;
  source: string;
  message: string;
}

function emptyStats(): BuildStats {
  return {
    inputLines: 0,
    recoveredTimestamps: 0,
    repairedComponents: 0,
    overlapSkipped: 0,
    bootEvents: 0,
    filtered: 0,
    dropped: 0,
    droppedByReason: {
      invalid_timestamp: 0,
      unrecoverable_timestamp: 0,
      unknown_severity: 0,
    },
    collapsedConsecutive: 0,
    collapsedGlobal: 0,
    events: 0,
  };
}

// hmi-boss -> hmiboss, so that process names line up with stream names
function foldName(name: string): string {
  return name.toLowerCase().replace(/-/g, '');
}

export class TimelineBuilder extends EventEmitter<TimelineBuilderEvents> {
  private logger = createChildLogger({ component: 'TimelineBuilder' });
  private config: TimelineBuilderConfig;

  constructor(config: Partial<TimelineBuilderConfig> = {}) {
    super();
    this.config = { ...DEFAULT_TIMELINE_CONFIG, ...config };
  }

  /**
   * Build a timeline from every stream of one station.
   * Malformed lines are dropped and counted; the build itself never fails.
   */
  build(streams: LineStream[]): TimelineBuildResult {
    const stats = emptyStats();
    const entries = this.collect(streams, stats);

    entries.sort(compareByTimestamp);

    const consecutive = this.collapseConsecutive(entries, stats);
    const events = this.collapseGlobal(consecutive, stats);
    stats.events = events.length;

    this.emit('built', stats);
    this.logger.info({
      inputLines: stats.inputLines,
      events: stats.events,
      dropped: stats.dropped,
      recoveredTimestamps: stats.recoveredTimestamps,
    }, 'Timeline built');

    return { events, stats };
  }

  /**
   * Turn one tuple into a timeline entry, recovering its timestamp and component
   * where possible.
   */
  private toEntry(tuple: LineTuple, stats: BuildStats): TimelineEntry {
    const severity = parseSeverityCode(tuple.severityCode);
    if (!severity) {
      throw new MalformedLineError('unknown_severity', `Unknown severity code "${tuple.severityCode}"`);
    }

    let message = tuple.message;
    let timestamp: Date;

    if (isSentinelTimestamp(tuple.rawTimestamp)) {
      const embedded = EMBEDDED_TIMESTAMP.exec(message);
      const parsed = parseTimestamp(embedded?.[1] ?? '');
      if (!embedded || !parsed.ok) {
        throw new MalformedLineError(
          'unrecoverable_timestamp',
          'Sentinel timestamp and no embedded date-time in message'
        );
      }
      timestamp = parsed.time;
      const before = message.slice(0, embedded.index).trimEnd();
      const after = message.slice(embedded.index + embedded[0].length).trimStart();
      message = `${before} ${after}`.trim();
      stats.recoveredTimestamps++;
    } else {
      const parsed = parseTimestamp(tuple.rawTimestamp, this.config.referenceYear);
      if (!parsed.ok) {
        throw new MalformedLineError('invalid_timestamp', `Unparseable timestamp "${tuple.rawTimestamp}"`);
      }
      timestamp = parsed.time;
    }

    let source = tuple.component.trim();
    message = message.replace(LEVEL_PREFIX, '');

    const tag = LEADING_TAG.exec(message);
    if (tag?.[1]) {
      const name = tag[1].trim();
      const recovered = this.isPlaceholder(source) && COMPONENT_NAME.test(name);
      if (recovered) {
        source = name;
        stats.repairedComponents++;
      }
      // The tag only repeats the component now
      if (recovered || name.toLowerCase() === source.toLowerCase()) {
        message = message.slice(tag[0].length).replace(LEVEL_PREFIX, '');
      }
    }

    return { timestamp, severity, source: source || 'unknown', message: message.trim() };
  }

  private collect(streams: LineStream[], stats: BuildStats): TimelineEntry[] {
    const known = new Set(
      streams.filter((s) => s.kind === 'component').map((s) => foldName(s.name))
    );
    const entries: TimelineEntry[] = [];

    for (const stream of streams) {
      for (const tuple of stream.lines) {
        stats.inputLines++;

        const isBoot =
          stream.kind === 'system' &&
          this.config.detectBootEvents &&
          BOOT_MARKER.test(tuple.message);

        if (!isBoot && stream.kind === 'system' && this.config.skipSystemOverlap &&
            this.coveredByComponentStream(tuple.component, known)) {
          stats.overlapSkipped++;
          continue;
        }

        let entry: TimelineEntry;
        try {
          entry = isBoot
            ? this.toBootEntry(tuple, stats)
            : this.toEntry(tuple, stats);
        } catch (error) {
          if (!(error instanceof MalformedLineError)) {
            throw error;
          }
          stats.dropped++;
          stats.droppedByReason[error.reason]++;
          this.emit('lineDropped', error, tuple, stream.name);
          this.logger.debug({ stream: stream.name, reason: error.reason }, 'Dropped malformed line');
          continue;
        }

        if (!isAtLeast(entry.severity, this.config.minSeverity)) {
          stats.filtered++;
          continue;
        }
        entries.push(entry);
      }
    }

    return entries;
  }

  private toBootEntry(tuple: LineTuple, stats: BuildStats): TimelineEntry {
    const entry = this.toEntry({ ...tuple, severityCode: 'I' }, stats);
    stats.bootEvents++;
    return { ...entry, source: 'kernel', message: `System boot: ${entry.message}` };
  }

  private coveredByComponentStream(component: string, known: Set<string>): boolean {
    const process = foldName(component.replace(PID_SUFFIX, ''));
    if (!process) {
      return false;
    }
    for (const name of known) {
      if (process === name || name.includes(process) || process.includes(name)) {
        return true;
      }
    }
    return false;
  }

  private isPlaceholder(component: string): boolean {
    return component === '' || this.config.placeholderComponents.includes(component);
  }

  private keyOf(severity: Severity, source: string, message: string): string {
    return dedupKey(severity, source, normalize(message, { minDigitRun: this.config.dedupMinDigitRun }));
  }

  /**
   * Pass 1: fold runs of identical (normalized) entries
   */
  private collapseConsecutive(entries: TimelineEntry[], stats: BuildStats): TimelineEvent[] {
    const collapsed: TimelineEvent[] = [];
    let pending: TimelineEvent | null = null;
    let pendingKey = '';

    for (const entry of entries) {
      const key = this.keyOf(entry.severity, entry.source, entry.message);
      if (pending && key === pendingKey) {
        pending.repeatCount++;
        pending.lastSeen = entry.timestamp;
        stats.collapsedConsecutive++;
        continue;
      }
      if (pending) {
        collapsed.push(pending);
      }
      pending = createEvent(entry.timestamp, entry.severity, entry.source, entry.message);
      pendingKey = key;
    }
    if (pending) {
      collapsed.push(pending);
    }

    return collapsed;
  }

  /**
   * Pass 2: merge the same condition across the whole sequence, keeping the first
   * occurrence's timestamp and position
   */
  private collapseGlobal(events: TimelineEvent[], stats: BuildStats): TimelineEvent[] {
    const byKey = new Map<string, TimelineEvent>();
    const ordered: TimelineEvent[] = [];

    for (const event of events) {
      const message = stripRepeatAnnotation(event.message);
      const key = this.keyOf(event.severity, event.source, message);
      const existing = byKey.get(key);

      if (existing) {
        existing.repeatCount += event.repeatCount;
        if (event.lastSeen.getTime() > existing.lastSeen.getTime()) {
          existing.lastSeen = event.lastSeen;
        }
        stats.collapsedGlobal++;
        continue;
      }

      const first: TimelineEvent = { ...event, message };
      byKey.set(key, first);
      ordered.push(first);
    }

    return ordered;
  }
}
