/**
 * GapDetector Tests
 */
import { describe, it, expect } from 'vitest';
import { GapDetector } from './gap-detector.js';
import { createEvent } from '../events/event.js';
import type { TimelineEvent } from '../events/types.js';

function at(iso: string, source: string = 'OCPP'): TimelineEvent {
  return createEvent(new Date(iso), 'HIGH', source, 'WebSocket failed');
}

describe('GapDetector', () => {
  const detector = new GapDetector();

  describe('detect()', () => {
    it('should find nothing in empty or single-event timelines', () => {
      expect(detector.detect([])).toEqual([]);
      expect(detector.detect([at('2026-02-18T10:00:00.000Z')])).toEqual([]);
    });

    it('should report a gap just over the threshold', () => {
      const gaps = detector.detect([
        at('2026-02-18T10:00:00.000Z', 'OCPP'),
        at('2026-02-18T10:05:01.000Z', 'NetworkBoss'),
      ]);

      expect(gaps).toEqual([
        {
          fromTimestamp: new Date('2026-02-18T10:00:00.000Z'),
          toTimestamp: new Date('2026-02-18T10:05:01.000Z'),
          durationSeconds: 301,
          fromSource: 'OCPP',
          toSource: 'NetworkBoss',
        },
      ]);
    });

    it('should not report a gap exactly at the threshold', () => {
      expect(
        detector.detect([at('2026-02-18T10:00:00.000Z'), at('2026-02-18T10:05:00.000Z')])
      ).toEqual([]);
    });

    it('should ignore fractional seconds', () => {
      expect(
        detector.detect([at('2026-02-18T10:00:00.900Z'), at('2026-02-18T10:05:00.999Z')])
      ).toEqual([]);
    });

    it('should order gaps longest first', () => {
      const gaps = detector.detect([
        at('2026-02-18T10:00:00.000Z'),
        at('2026-02-18T10:10:00.000Z'),
        at('2026-02-18T11:00:00.000Z'),
        at('2026-02-18T11:07:00.000Z'),
      ]);

      expect(gaps.map((g) => g.durationSeconds)).toEqual([3000, 600, 420]);
    });

    it('should add a day to a negative delta', () => {
      const gaps = detector.detect([at('2026-02-18T23:59:00.000Z'), at('2026-02-18T00:10:00.000Z')]);

      expect(gaps[0]!.durationSeconds).toBe(660);
    });

    it('should honour a custom threshold', () => {
      const strict = new GapDetector({ thresholdSeconds: 60 });

      expect(strict.detect([at('2026-02-18T10:00:00.000Z'), at('2026-02-18T10:01:01.000Z')])).toHaveLength(1);
    });
  });

  describe('longestGap()', () => {
    it('should return null without gaps', () => {
      expect(detector.longestGap([at('2026-02-18T10:00:00.000Z')])).toBeNull();
    });

    it('should return the longest gap', () => {
      const longest = detector.longestGap([
        at('2026-02-18T10:00:00.000Z', 'A'),
        at('2026-02-18T10:06:00.000Z', 'B'),
        at('2026-02-18T12:00:00.000Z', 'C'),
      ]);

      expect(longest?.fromSource).toBe('B');
      expect(longest?.durationSeconds).toBe(6840);
    });
  });
});
