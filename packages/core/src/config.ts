import { AccessLogRecord, KeySelector, PipelineError, RecordParser, TopNPipelineOptions } from './types';
import { toSeconds } from './utils';
import { assertTimeZone } from './report-formatter';

export interface ResolvedPipelineOptions {
  windowSize: number;
  windowSlide: number;
  allowedLateness: number;
  topSize: number;
  timeZone: string;
  keySelector: KeySelector<AccessLogRecord>;
  parser?: RecordParser;
  metricsInterval: number;
  maxMemoryMB: number;
}

export const DEFAULT_OPTIONS = {
  windowSize: '10s',
  allowedLateness: '10s',
  topSize: 10,
  timeZone: 'UTC',
  metricsInterval: 5000,
  maxMemoryMB: 100
} as const;

export function resolveOptions(options: TopNPipelineOptions = {}): ResolvedPipelineOptions {
  const windowSize = toSeconds(options.windowSize ?? DEFAULT_OPTIONS.windowSize, 'windowSize');
  const windowSlide = options.windowSlide !== undefined
    ? toSeconds(options.windowSlide, 'windowSlide')
    : windowSize;
  if (windowSize === 0 || windowSlide === 0 || windowSlide > windowSize) {
    throw new PipelineError(
      'Window size and slide must be positive and the slide must not exceed the size',
      'INVALID_CONFIG',
      { windowSize, windowSlide }
    );
  }

  const topSize = options.topSize ?? DEFAULT_OPTIONS.topSize;
  if (!Number.isInteger(topSize) || topSize <= 0) {
    throw new PipelineError('Top-N size must be a positive integer', 'INVALID_CONFIG', { topSize });
  }

  const timeZone = options.timeZone ?? DEFAULT_OPTIONS.timeZone;
  assertTimeZone(timeZone);

  return {
    windowSize,
    windowSlide,
    allowedLateness: toSeconds(options.allowedLateness ?? DEFAULT_OPTIONS.allowedLateness, 'allowedLateness'),
    topSize,
    timeZone,
    keySelector: options.keySelector || ((record) => record.requestPath),
    parser: options.parser,
    metricsInterval: options.metricsInterval ?? DEFAULT_OPTIONS.metricsInterval,
    maxMemoryMB: options.maxMemoryMB ?? DEFAULT_OPTIONS.maxMemoryMB
  };
}

function parseInteger(raw: string, name: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(value)) {
    throw new PipelineError(`${name} must be an integer, got "${raw}"`, 'INVALID_CONFIG', { variable: name });
  }
  return value;
}

/** A plain number of seconds or a window string */
export function parseDuration(raw: string): string | number {
  return /^\d+$/.test(raw.trim()) ? Number(raw) : raw;
}

/**
 * Reads pipeline settings from HOTPATH_* environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TopNPipelineOptions {
  const options: TopNPipelineOptions = {
    windowSize: env.HOTPATH_WINDOW_SIZE ? parseDuration(env.HOTPATH_WINDOW_SIZE) : DEFAULT_OPTIONS.windowSize,
    allowedLateness: env.HOTPATH_ALLOWED_LATENESS
      ? parseDuration(env.HOTPATH_ALLOWED_LATENESS)
      : DEFAULT_OPTIONS.allowedLateness,
    topSize: env.HOTPATH_TOP_SIZE ? parseInteger(env.HOTPATH_TOP_SIZE, 'HOTPATH_TOP_SIZE') : DEFAULT_OPTIONS.topSize,
    timeZone: env.HOTPATH_TIME_ZONE || DEFAULT_OPTIONS.timeZone
  };

  if (env.HOTPATH_WINDOW_SLIDE) {
    options.windowSlide = parseDuration(env.HOTPATH_WINDOW_SLIDE);
  }

  // Fail fast on bad values
  resolveOptions(options);
  return options;
}
