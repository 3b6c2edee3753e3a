import { describe, it, expect } from 'vitest';
import {
  SEVERITY_CODE_MAP,
  compareSeverityDesc,
  isAtLeast,
  isSeverity,
  isSeverityCode,
  parseSeverityCode,
} from './severity.js';

describe('severity', () => {
  it('should map ingest codes onto severities', () => {
    expect(SEVERITY_CODE_MAP).toEqual({
      E: 'HIGH',
      C: 'CRITICAL',
      W: 'MEDIUM',
      I: 'INFO',
      N: 'INFO',
    });
  });

  it('should recognise codes and names', () => {
    expect(isSeverityCode('E')).toBe(true);
    expect(isSeverityCode('X')).toBe(false);
    expect(isSeverityCode('toString')).toBe(false);
    expect(isSeverity('LOW')).toBe(true);
    expect(isSeverity('low')).toBe(false);
  });

  it('should parse ingest codes and reject unknown ones', () => {
    expect(parseSeverityCode('C')).toBe('CRITICAL');
    expect(parseSeverityCode('N')).toBe('INFO');
    expect(parseSeverityCode('D')).toBeNull();
    expect(parseSeverityCode('')).toBeNull();
  });

  it('should compare against a floor', () => {
    expect(isAtLeast('CRITICAL', 'HIGH')).toBe(true);
    expect(isAtLeast('HIGH', 'HIGH')).toBe(true);
    expect(isAtLeast('MEDIUM', 'HIGH')).toBe(false);
  });

  it('should sort most severe first', () => {
    const sorted = (['INFO', 'CRITICAL', 'MEDIUM', 'HIGH', 'LOW'] as const)
      .slice()
      .sort(compareSeverityDesc);

    expect(sorted).toEqual(['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO']);
  });
});
