/**
 * Metric Store
 * Run-scoped counters plus an append-only issue list for one station
 */

import { ValidationError, type Severity } from '@chargetrace/shared';
import type { Issue, MetricReader, MetricSnapshot, MetricValue } from './types.js';

const INTEGER_TEXT = /^[+-]?\d+$/;

function readInt(key: string, value: MetricValue | undefined): number {
  if (value === undefined) {
    return 0;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Counter "${key}" is not a finite number`, { key, value });
    }
    return Math.trunc(value);
  }
  const trimmed = value.trim();
  if (trimmed === '') {
    return 0;
  }
  if (!INTEGER_TEXT.test(trimmed)) {
    throw new ValidationError(`Counter "${key}" is not numeric: "${value}"`, { key, value });
  }
  return Number.parseInt(trimmed, 10);
}

export class MetricStore implements MetricReader {
  private values = new Map<string, MetricValue>();
  private issueList: Issue[] = [];

  constructor(initial: Record<string, MetricValue> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  set(key: string, value: MetricValue): this {
    this.values.set(key, value);
    return this;
  }

  /**
   * Add to a numeric counter, starting from 0
   */
  increment(key: string, by: number = 1): number {
    const next = this.int(key) + by;
    this.values.set(key, next);
    return next;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): MetricValue {
    return this.values.get(key) ?? 0;
  }

  int(key: string): number {
    return readInt(key, this.values.get(key));
  }

  text(key: string): string {
    return String(this.get(key));
  }

  addIssue(issue: Issue): void {
    this.issueList.push({ ...issue });
  }

  issues(): readonly Readonly<Issue>[] {
    return this.issueList.map((issue) => ({ ...issue }));
  }

  issueCountBySeverity(): Record<Severity, number> {
    const counts: Record<Severity, number> = { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFO: 0 };
    for (const issue of this.issueList) {
      counts[issue.severity]++;
    }
    return counts;
  }

  /**
   * Frozen copy; later writes to the store do not show through
   */
  snapshot(): MetricSnapshot {
    const values: Readonly<Record<string, MetricValue>> = Object.freeze(Object.fromEntries(this.values));
    const issues = Object.freeze(this.issueList.map((issue) => Object.freeze({ ...issue })));
    const lookup = (key: string): MetricValue | undefined =>
      Object.prototype.hasOwnProperty.call(values, key) ? values[key] : undefined;

    return Object.freeze({
      values,
      issues,
      has: (key: string) => lookup(key) !== undefined,
      get: (key: string) => lookup(key) ?? 0,
      int: (key: string) => readInt(key, lookup(key)),
      text: (key: string) => String(lookup(key) ?? 0),
    });
  }

  get size(): number {
    return this.values.size;
  }
}
