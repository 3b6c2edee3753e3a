/**
 * LineStreamReader Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { LineStreamReader } from './line-stream-reader.js';

describe('LineStreamReader', () => {
  let reader: LineStreamReader;

  beforeEach(() => {
    reader = new LineStreamReader();
  });

  describe('detectFormat()', () => {
    it('should detect raw application logs', () => {
      const sample = `2026-02-18 17:33:29.617 [N] OCPP: Connected
2026-02-18 17:33:30.001 [E] OCPP: WebSocket failed`;

      expect(reader.detectFormat(sample)).toBe('app');
    });

    it('should fall back to the parsed format', () => {
      expect(reader.detectFormat('2026-02-18 17:33:29.617|E|OCPP|boom')).toBe('parsed');
      expect(reader.detectFormat('')).toBe('parsed');
    });
  });

  describe('readParsed()', () => {
    it('should split on the first three pipes only', () => {
      const { stream, rejected } = reader.readParsed(
        '2026-02-18 10:00:00.000|E|OCPP|Frame a|b rejected\n',
        'ocpp'
      );

      expect(rejected).toBe(0);
      expect(stream).toEqual({
        name: 'ocpp',
        kind: 'component',
        lines: [
          {
            rawTimestamp: '2026-02-18 10:00:00.000',
            severityCode: 'E',
            component: 'OCPP',
            message: 'Frame a|b rejected',
          },
        ],
      });
    });

    it('should skip blank lines and count rejects', () => {
      const text = [
        '2026-02-18 10:00:00.000|W|NetworkBoss|eth0 down',
        '',
        'no pipes here',
        '2026-02-18 10:00:01.000|E|NetworkBoss|eth0 up\r',
      ].join('\n');

      const { stream, rejected } = reader.readParsed(text, 'network', 'system');

      expect(stream.kind).toBe('system');
      expect(stream.lines).toHaveLength(2);
      expect(stream.lines[1]!.message).toBe('eth0 up');
      expect(rejected).toBe(1);
    });
  });

  describe('readAppLog()', () => {
    it('should extract timestamp, level, component and message', () => {
      const { stream, format } = reader.readAppLog(
        '2026-02-18 17:33:29.617 [E] ChargerApp: Power board fault: code 22',
        'charger'
      );

      expect(format).toBe('app');
      expect(stream.lines).toEqual([
        {
          rawTimestamp: '2026-02-18 17:33:29.617',
          severityCode: 'E',
          component: 'ChargerApp',
          message: 'Power board fault: code 22',
        },
      ]);
    });

    it('should reject lines without the app log shape', () => {
      const { stream, rejected } = reader.readAppLog('Feb 17 15:23:00 buildroot kernel: boot', 'kern');

      expect(stream.lines).toHaveLength(0);
      expect(rejected).toBe(1);
    });
  });
});
