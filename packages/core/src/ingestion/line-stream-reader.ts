/**
 * Line Stream Reader
 * Turns already-extracted log text into line tuples for the timeline builder
 */

import { createChildLogger } from '@chargetrace/shared';
import type {
  LineFormat,
  LineStream,
  LineStreamReadResult,
  LineTuple,
  StreamKind,
} from './types.js';

// "2026-02-18 17:33:29.617 [N] component: message"
const APP_LOG_LINE =
  /^(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d+) \[([A-Z])\] ([^:]+): (.*)$/;

export class LineStreamReader {
  private logger = createChildLogger({ component: 'LineStreamReader' });

  /**
   * Read text in either supported shape, detecting it from the first lines when asked
   */
  read(text: string, name: string, kind: StreamKind = 'component', format: LineFormat = 'auto'): LineStreamReadResult {
    const resolved = format === 'auto' ? this.detectFormat(text) : format;
    return resolved === 'app'
      ? this.collect(text, name, kind, 'app', (line) => this.parseAppLogLine(line))
      : this.collect(text, name, kind, 'parsed', (line) => this.parseParsedLine(line));
  }

  /**
   * Read `TIMESTAMP|LEVEL|COMPONENT|MESSAGE` lines
   */
  readParsed(text: string, name: string, kind: StreamKind = 'component'): LineStreamReadResult {
    return this.read(text, name, kind, 'parsed');
  }

  /**
   * Read raw application log lines
   */
  readAppLog(text: string, name: string, kind: StreamKind = 'component'): LineStreamReadResult {
    return this.read(text, name, kind, 'app');
  }

  /**
   * Detect format from the first non-blank lines
   */
  detectFormat(sample: string): Exclude<LineFormat, 'auto'> {
    const lines = sample.split('\n').filter((line) => line.trim()).slice(0, 20);
    const appCount = lines.filter((line) => APP_LOG_LINE.test(line.trimEnd())).length;
    return lines.length > 0 && appCount >= lines.length * 0.5 ? 'app' : 'parsed';
  }

  /**
   * Split on the first three pipes only; the message may contain more
   */
  parseParsedLine(line: string): LineTuple | null {
    const fields: string[] = [];
    let rest = line;
    for (let i = 0; i < 3; i++) {
      const at = rest.indexOf('|');
      if (at < 0) {
        return null;
      }
      fields.push(rest.slice(0, at));
      rest = rest.slice(at + 1);
    }

    const [rawTimestamp = '', severityCode = '', component = ''] = fields;
    return {
      rawTimestamp: rawTimestamp.trim(),
      severityCode: severityCode.trim(),
      component: component.trim(),
      message: rest.trim(),
    };
  }

  parseAppLogLine(line: string): LineTuple | null {
    const match = APP_LOG_LINE.exec(line.trimEnd());
    if (!match) {
      return null;
    }
    const [, rawTimestamp = '', severityCode = '', component = '', message = ''] = match;
    return {
      rawTimestamp,
      severityCode,
      component: component.trim(),
      message: message.trim(),
    };
  }

  private collect(
    text: string,
    name: string,
    kind: StreamKind,
    format: Exclude<LineFormat, 'auto'>,
    parseLine: (line: string) => LineTuple | null
  ): LineStreamReadResult {
    const lines: LineTuple[] = [];
    let rejected = 0;

    for (const line of text.split('\n')) {
      if (!line.trim()) {
        continue;
      }
      const tuple = parseLine(line.replace(/\r$/, ''));
      if (tuple) {
        lines.push(tuple);
      } else {
        rejected++;
      }
    }

    if (rejected > 0) {
      this.logger.debug({ stream: name, rejected }, 'Lines rejected while reading stream');
    }

    const stream: LineStream = { name, kind, lines };
    return { stream, format, rejected };
  }
}
