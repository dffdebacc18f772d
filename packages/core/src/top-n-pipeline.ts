import { EventEmitter } from 'eventemitter3';
import {
  AccessLogRecord,
  EmittedReport,
  LogSourceAdapter,
  PipelineError,
  StreamOptions,
  TopNPipelineOptions,
  WindowBounds
} from './types';
import { EventTimeAssigner } from './event-time-assigner';
import { LateRecord, WindowAggregator } from './window-aggregator';
import { TopNSelector } from './top-n-selector';
import { formatReport } from './report-formatter';
import { PerformanceMetrics, PerformanceMonitor } from './performance-monitor';
import { resolveOptions, ResolvedPipelineOptions } from './config';

export interface ParseFailure {
  line: string;
  error: PipelineError;
}

export interface TopNPipelineEvents {
  report: (report: EmittedReport) => void;
  parseError: (failure: ParseFailure) => void;
  lateRecordDropped: (late: LateRecord) => void;
  windowClosed: (window: WindowBounds, keyCount: number) => void;
  performanceMetrics: (metrics: PerformanceMetrics) => void;
  memoryWarning: (info: { usedMB: number }) => void;
  adapterAdded: (name: string) => void;
}

/**
 * Top-N URL ranking over event-time windows
 * @extends EventEmitter
 * @fires TopNPipeline#report - When a window's ranking is complete
 * @fires TopNPipeline#parseError - When a raw line cannot be parsed; the line is skipped
 * @fires TopNPipeline#lateRecordDropped - When a record arrives after its window closed
 * @example
 * ```typescript
 * const pipeline = new TopNPipeline({ windowSize: '10s', topSize: 10, parser: new AccessLogParser() });
 * pipeline.addAdapter('file', new FileAdapter());
 * for await (const { text } of pipeline.run('file', './access.log')) {
 *   process.stdout.write(text);
 * }
 * ```
 */
export class TopNPipeline extends EventEmitter<TopNPipelineEvents> {
  private adapters: Map<string, LogSourceAdapter> = new Map();
  private options: ResolvedPipelineOptions;
  private activeAggregators: Set<WindowAggregator> = new Set();
  private performanceMonitor: PerformanceMonitor;

  constructor(options: TopNPipelineOptions = {}) {
    super();
    this.options = resolveOptions(options);

    this.performanceMonitor = new PerformanceMonitor(this.options.metricsInterval, this.options.maxMemoryMB);
    this.performanceMonitor.start();

    this.performanceMonitor.on('metrics', (metrics) => {
      this.emit('performanceMetrics', metrics);
    });

    this.performanceMonitor.on('highMemoryUsage', (info) => {
      this.emit('memoryWarning', info);
    });
  }

  addAdapter(name: string, adapter: LogSourceAdapter): void {
    if (this.adapters.has(name)) {
      throw new PipelineError(
        `Adapter ${name} already registered`,
        'ADAPTER_EXISTS'
      );
    }
    this.adapters.set(name, adapter);
    this.emit('adapterAdded', name);
  }

  getAdapter(name: string): LogSourceAdapter | undefined {
    if (this.adapters.has(name)) {
      return this.adapters.get(name);
    }

    for (const [registered, adapter] of this.adapters) {
      if (registered.toLowerCase() === name.toLowerCase()) {
        return adapter;
      }
    }
    return undefined;
  }

  /**
   * Ranks the lines a registered adapter produces for the given query.
   */
  async *run(source: string, query: string, streamOptions?: StreamOptions): AsyncGenerator<EmittedReport> {
    const adapter = this.getAdapter(source);
    if (!adapter) {
      throw new PipelineError(
        'Required log source adapter not found',
        'ADAPTER_NOT_FOUND',
        {
          source,
          availableAdapters: Array.from(this.adapters.keys())
        }
      );
    }

    if (!adapter.validateQuery(query)) {
      throw new PipelineError(
        `Invalid query for source ${source}: ${query}`,
        'INVALID_CONFIG',
        { source, query }
      );
    }

    yield* this.processLines(adapter.createStream(query, streamOptions));
  }

  async *processLines(lines: AsyncIterable<string>): AsyncGenerator<EmittedReport> {
    if (!this.options.parser) {
      throw new PipelineError('A record parser is required to process raw lines', 'INVALID_CONFIG');
    }
    yield* this.processRecords(this.parseLines(lines));
  }

  async *processRecords(records: AsyncIterable<AccessLogRecord>): AsyncGenerator<EmittedReport> {
    const assigner = new EventTimeAssigner({ allowedLateness: this.options.allowedLateness });
    const aggregator = new WindowAggregator({
      windowSize: this.options.windowSize,
      windowSlide: this.options.windowSlide,
      keySelector: this.options.keySelector
    });
    const selector = new TopNSelector({ topSize: this.options.topSize });

    aggregator.on('lateRecordDropped', (late) => {
      this.performanceMonitor.recordLateDrop();
      this.emit('lateRecordDropped', late);
    });
    aggregator.on('windowClosed', (window, keyCount) => {
      this.emit('windowClosed', window, keyCount);
    });

    this.activeAggregators.add(aggregator);

    try {
      const elements = assigner.assign(this.instrument(records));
      for await (const report of selector.select(aggregator.aggregate(elements))) {
        const emitted: EmittedReport = {
          report,
          text: formatReport(report, { timeZone: this.options.timeZone })
        };
        this.performanceMonitor.recordReport();
        this.emit('report', emitted);
        yield emitted;
      }
    } finally {
      this.activeAggregators.delete(aggregator);
      aggregator.removeAllListeners();
      aggregator.clear();
      selector.clear();
    }
  }

  getMetrics(): PerformanceMetrics {
    return this.performanceMonitor.getMetrics();
  }

  async destroy(): Promise<void> {
    this.performanceMonitor.stop();
    this.performanceMonitor.removeAllListeners();

    for (const aggregator of this.activeAggregators) {
      aggregator.clear();
    }
    this.activeAggregators.clear();

    for (const adapter of this.adapters.values()) {
      await adapter.destroy();
    }
    this.adapters.clear();

    this.removeAllListeners();
  }

  private async *parseLines(lines: AsyncIterable<string>): AsyncGenerator<AccessLogRecord> {
    const parser = this.options.parser;
    if (!parser) return;

    for await (const line of lines) {
      let record: AccessLogRecord;
      try {
        record = parser.parse(line);
      } catch (error) {
        const failure = error instanceof PipelineError
          ? error
          : new PipelineError(error instanceof Error ? error.message : String(error), 'PARSE_ERROR', { line });
        this.performanceMonitor.recordParseError();
        this.emit('parseError', { line, error: failure });
        continue;
      }
      yield record;
    }
  }

  private async *instrument(records: AsyncIterable<AccessLogRecord>): AsyncGenerator<AccessLogRecord> {
    for await (const record of records) {
      const startTime = Date.now();
      yield record;
      this.performanceMonitor.recordProcessed(startTime);
    }
  }
}
