import * as fs from 'fs';
import * as path from 'path';
import * as peggy from 'peggy';
import { LRUCache } from 'lru-cache';
import { AccessLogRecord, PipelineError, RecordParser } from '@hotpath/core';

const GRAMMAR_PATH = path.resolve(__dirname, '..', 'grammar', 'access-log.pegjs');

export interface AccessLogParserOptions {
  /** Distinct timestamp strings whose epoch value is memoized */
  timestampCacheSize?: number;
  /** Grammar source; defaults to the bundled combined-log grammar */
  grammar?: string;
}

interface RawTimestamp {
  text: string;
  day: number;
  month: number;
  year: number;
  hour: number;
  minute: number;
  second: number;
  offsetMinutes: number;
}

interface RawAccessLine {
  clientIp: string;
  timestamp: RawTimestamp;
  request: { method?: string; path: string; httpVersion?: string };
  status: string;
  bytes: string;
  referer: string;
  userAgent: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isRawTimestamp(value: unknown): value is RawTimestamp {
  return isRecord(value) &&
    typeof value.text === 'string' &&
    ['day', 'month', 'year', 'hour', 'minute', 'second', 'offsetMinutes']
      .every((field) => typeof value[field] === 'number');
}

function isRawAccessLine(value: unknown): value is RawAccessLine {
  if (!isRecord(value) || !isRecord(value.request)) return false;
  const request = value.request;
  return typeof value.clientIp === 'string' &&
    isRawTimestamp(value.timestamp) &&
    typeof request.path === 'string' &&
    (request.method === undefined || typeof request.method === 'string') &&
    (request.httpVersion === undefined || typeof request.httpVersion === 'string') &&
    typeof value.status === 'string' &&
    typeof value.bytes === 'string' &&
    typeof value.referer === 'string' &&
    typeof value.userAgent === 'string';
}

function syntaxErrorPosition(error: unknown): { line: number; column: number } | undefined {
  if (!(error instanceof Error) || !('location' in error)) return undefined;
  const location = error.location;
  if (!isRecord(location) || !isRecord(location.start)) return undefined;
  const { line, column } = location.start;
  if (typeof line !== 'number' || typeof column !== 'number') return undefined;
  return { line, column };
}

/**
 * Parses access log lines in the combined (or common) log format.
 */
export class AccessLogParser implements RecordParser {
  private parser: peggy.Parser;
  private timestamps: LRUCache<string, number>;

  constructor(options: AccessLogParserOptions = {}) {
    const grammar = options.grammar ?? fs.readFileSync(GRAMMAR_PATH, 'utf8');
    this.parser = peggy.generate(grammar);
    this.timestamps = new LRUCache<string, number>({
      max: options.timestampCacheSize ?? 1024
    });
  }

  parse(line: string): AccessLogRecord {
    const input = line.replace(/[\r\n]+$/, '');
    let result: unknown;

    try {
      result = this.parser.parse(input);
    } catch (error) {
      const position = syntaxErrorPosition(error);
      if (position) {
        throw new PipelineError(
          `Access log parse error at line ${position.line}, column ${position.column}: ${error instanceof Error ? error.message : String(error)}`,
          'PARSE_ERROR',
          { input, ...position }
        );
      }
      throw error;
    }

    if (!isRawAccessLine(result)) {
      throw new PipelineError('Access log grammar produced an unexpected value', 'PARSE_ERROR', { line: input });
    }

    return {
      clientIp: result.clientIp,
      eventTime: this.toEpochSeconds(result.timestamp),
      requestPath: result.request.path,
      statusCode: result.status,
      bodyBytes: result.bytes,
      referer: result.referer,
      userAgent: result.userAgent,
      method: result.request.method,
      httpVersion: result.request.httpVersion
    };
  }

  validate(line: string): { valid: boolean; error?: string } {
    try {
      this.parse(line);
      return { valid: true };
    } catch (error) {
      return {
        valid: false,
        error: error instanceof Error ? error.message : 'Unknown error'
      };
    }
  }

  /**
   * Converts the log timestamp to epoch seconds, honoring its UTC offset.
   */
  private toEpochSeconds(timestamp: RawTimestamp): number {
    const cached = this.timestamps.get(timestamp.text);
    if (cached !== undefined) {
      return cached;
    }

    const { year, month, day, hour, minute, second, offsetMinutes } = timestamp;
    // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx
    const wallClock = new Date(0);
    wallClock.setUTCFullYear(year, month - 1, day);
    wallClock.setUTCHours(hour, minute, second, 0);

    // Out-of-range fields roll over (31/Feb into March); a mismatch means the date does not exist
    if (
      wallClock.getUTCFullYear() !== year ||
      wallClock.getUTCMonth() !== month - 1 ||
      wallClock.getUTCDate() !== day ||
      wallClock.getUTCHours() !== hour ||
      wallClock.getUTCMinutes() !== minute ||
      wallClock.getUTCSeconds() !== second
    ) {
      throw new PipelineError(`Invalid timestamp: ${timestamp.text}`, 'INVALID_TIMESTAMP', { timestamp: timestamp.text });
    }

    const epochSeconds = wallClock.getTime() / 1000 - offsetMinutes * 60;
    this.timestamps.set(timestamp.text, epochSeconds);
    return epochSeconds;
  }
}
