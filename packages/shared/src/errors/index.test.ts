/**
 * Error hierarchy Tests
 */
import { describe, it, expect } from 'vitest';
import {
  ChargeTraceError,
  MalformedLineError,
  RuleEvaluationError,
  StationAnalysisError,
  ValidationError,
  wrapError,
} from './index.js';

describe('errors', () => {
  it('should default category and severity', () => {
    const err = new ChargeTraceError('boom', 'E0000');

    expect(err.context.category).toBe('UNKNOWN');
    expect(err.context.severity).toBe('MEDIUM');
    expect(err).toBeInstanceOf(Error);
  });

  it('should carry the drop reason on MalformedLineError', () => {
    const err = new MalformedLineError('unknown_severity', 'Unknown severity code "X"');

    expect(err.code).toBe('E2001');
    expect(err.reason).toBe('unknown_severity');
    expect(err.context.category).toBe('INGESTION');
    expect(err.context.reason).toBe('unknown_severity');
  });

  it('should prefix the rule id on RuleEvaluationError', () => {
    const err = new RuleEvaluationError('storage-degradation', 'counter is not numeric');

    expect(err.message).toBe("Rule 'storage-degradation' failed: counter is not numeric");
    expect(err.ruleId).toBe('storage-degradation');
    expect(err.context.category).toBe('CAUSAL');
  });

  it('should attach the entity on StationAnalysisError', () => {
    const err = new StationAnalysisError('CP-7', 'stream unreadable');

    expect(err.context.entityId).toBe('CP-7');
    expect(err.context.category).toBe('FLEET');
  });

  it('should serialise to JSON', () => {
    const json = new ValidationError('bad input').toJSON();

    expect(json.name).toBe('ValidationError');
    expect(json.code).toBe('E1001');
    expect(json.context.category).toBe('VALIDATION');
  });

  describe('wrapError()', () => {
    it('should return ChargeTrace errors unchanged', () => {
      const err = new ValidationError('x');
      expect(wrapError(err)).toBe(err);
    });

    it('should wrap plain errors and keep the original name', () => {
      const wrapped = wrapError(new TypeError('nope'), { entityId: 'CP-1' });

      expect(wrapped.code).toBe('E9999');
      expect(wrapped.message).toBe('nope');
      expect(wrapped.context.originalError).toBe('TypeError');
      expect(wrapped.context.entityId).toBe('CP-1');
    });

    it('should stringify non-error values', () => {
      expect(wrapError(42).message).toBe('42');
    });
  });
});
