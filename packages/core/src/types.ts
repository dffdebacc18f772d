export interface AccessLogRecord {
  readonly clientIp: string;
  /** Seconds since the epoch */
  readonly eventTime: number;
  readonly requestPath: string;
  readonly statusCode: string;
  readonly bodyBytes: string;
  readonly referer: string;
  readonly userAgent: string;
  readonly method?: string;
  readonly httpVersion?: string;
}

export interface Watermark {
  readonly timestamp: number;
}

export interface WindowBounds {
  readonly start: number;
  readonly end: number;
}

export interface WindowCountEvent {
  readonly requestPath: string;
  readonly windowEnd: number;
  readonly count: number;
}

export interface RankedEntry {
  readonly requestPath: string;
  readonly count: number;
}

export interface RankedReport {
  readonly windowEnd: number;
  readonly entries: RankedEntry[];
}

export interface EmittedReport {
  report: RankedReport;
  text: string;
}

export type StreamElement<T> =
  | { kind: 'record'; value: T; timestamp: number }
  | { kind: 'watermark'; watermark: Watermark };

export interface AggregateFunction<IN, ACC, OUT> {
  createAccumulator(): ACC;
  add(value: IN, accumulator: ACC): ACC;
  getResult(accumulator: ACC): OUT;
  merge(a: ACC, b: ACC): ACC;
}

export type KeySelector<T> = (record: T) => string;

export interface RecordParser {
  parse(line: string): AccessLogRecord;
}

export interface TopNPipelineOptions {
  windowSize?: string | number;
  windowSlide?: string | number;
  allowedLateness?: string | number;
  topSize?: number;
  timeZone?: string;
  keySelector?: KeySelector<AccessLogRecord>;
  parser?: RecordParser;
  metricsInterval?: number;
  maxMemoryMB?: number;
}

export interface StreamOptions {
  [key: string]: unknown;
}

export interface LogSourceAdapter {
  createStream(query: string, options?: StreamOptions): AsyncIterable<string>;
  validateQuery(query: string): boolean;
  getName(): string;
  getAvailableStreams?(): Promise<string[]>;
  destroy(): Promise<void>;
}

export type PipelineErrorCode =
  | 'INVALID_CONFIG'
  | 'PARSE_ERROR'
  | 'INVALID_TIMESTAMP'
  | 'ADAPTER_EXISTS'
  | 'ADAPTER_NOT_FOUND'
  | 'SOURCE_NOT_FOUND'
  | 'LOKI_QUERY_ERROR'
  | 'LOKI_TAIL_FAILED';

export class PipelineError extends Error {
  code: PipelineErrorCode;
  details?: unknown;

  constructor(message: string, code: PipelineErrorCode, details?: unknown) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
  }
}
