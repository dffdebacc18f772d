import { EventEmitter } from 'eventemitter3';
import {
  AccessLogRecord,
  AggregateFunction,
  KeySelector,
  StreamElement,
  Watermark,
  WindowBounds,
  WindowCountEvent
} from './types';
import { SlidingWindowAssigner } from './window-assigner';
import { TimerService } from './timer-service';
import { countAggregate } from './aggregate-functions';

export interface WindowAggregatorOptions {
  windowSize: number;
  windowSlide?: number;
  keySelector?: KeySelector<AccessLogRecord>;
  aggregateFunction?: AggregateFunction<AccessLogRecord, number, number>;
}

export interface LateRecord {
  key: string;
  eventTime: number;
  window: WindowBounds;
  watermark: number;
}

export interface AccumulatorSnapshot {
  key: string;
  window: WindowBounds;
  accumulator: number;
}

export interface WindowAggregatorEvents {
  lateRecordDropped: (late: LateRecord) => void;
  windowClosed: (window: WindowBounds, keyCount: number) => void;
}

interface WindowState {
  bounds: WindowBounds;
  accumulators: Map<string, number>;
}

/**
 * Keyed event-time window aggregation.
 * Keeps one accumulator per (key, window), never the raw records, and emits one
 * WindowCountEvent per key once the watermark reaches the window end.
 */
export class WindowAggregator extends EventEmitter<WindowAggregatorEvents> {
  private assigner: SlidingWindowAssigner;
  private keySelector: KeySelector<AccessLogRecord>;
  private aggregateFunction: AggregateFunction<AccessLogRecord, number, number>;
  private windows: Map<number, WindowState> = new Map();
  private timers = new TimerService<number>();
  private watermark = Number.NEGATIVE_INFINITY;
  private metrics = {
    recordsAdded: 0,
    lateRecordsDropped: 0,
    windowsClosed: 0,
    eventsEmitted: 0
  };

  constructor(options: WindowAggregatorOptions) {
    super();
    this.assigner = new SlidingWindowAssigner({ size: options.windowSize, slide: options.windowSlide });
    this.keySelector = options.keySelector || ((record) => record.requestPath);
    this.aggregateFunction = options.aggregateFunction || countAggregate;
  }

  /**
   * Folds a record into every open window it belongs to.
   * @returns false when every window of the record had already closed
   */
  add(record: AccessLogRecord, eventTime: number): boolean {
    const key = this.keySelector(record);
    let accepted = false;

    for (const window of this.assigner.assignWindows(eventTime)) {
      if (window.end <= this.watermark) {
        this.metrics.lateRecordsDropped++;
        this.emit('lateRecordDropped', { key, eventTime, window, watermark: this.watermark });
        continue;
      }

      const state = this.getOrCreateWindow(window);
      const current = state.accumulators.get(key) ?? this.aggregateFunction.createAccumulator();
      state.accumulators.set(key, this.aggregateFunction.add(record, current));
      accepted = true;
    }

    if (accepted) {
      this.metrics.recordsAdded++;
    }
    return accepted;
  }

  /**
   * Closes every window whose end the watermark has reached, oldest first.
   */
  processWatermark(watermark: Watermark): WindowCountEvent[] {
    if (watermark.timestamp <= this.watermark) {
      return [];
    }
    this.watermark = watermark.timestamp;

    const emitted: WindowCountEvent[] = [];
    for (const timer of this.timers.advanceTo(watermark.timestamp)) {
      const state = this.windows.get(timer.key);
      if (!state) continue;
      this.windows.delete(timer.key);

      for (const [key, accumulator] of state.accumulators) {
        emitted.push({
          requestPath: key,
          windowEnd: state.bounds.end,
          count: this.aggregateFunction.getResult(accumulator)
        });
      }

      this.metrics.windowsClosed++;
      this.emit('windowClosed', state.bounds, state.accumulators.size);
    }

    this.metrics.eventsEmitted += emitted.length;
    return emitted;
  }

  /**
   * Open accumulators, for shipping partial aggregates to another instance.
   */
  snapshot(): AccumulatorSnapshot[] {
    const entries: AccumulatorSnapshot[] = [];
    for (const state of this.windows.values()) {
      for (const [key, accumulator] of state.accumulators) {
        entries.push({ key, window: state.bounds, accumulator });
      }
    }
    return entries;
  }

  /**
   * Merges partial accumulators produced elsewhere. Entries for closed windows are dropped as late.
   */
  mergeSnapshot(entries: Iterable<AccumulatorSnapshot>): void {
    for (const entry of entries) {
      if (entry.window.end <= this.watermark) {
        this.metrics.lateRecordsDropped++;
        this.emit('lateRecordDropped', {
          key: entry.key,
          eventTime: entry.window.start,
          window: entry.window,
          watermark: this.watermark
        });
        continue;
      }

      const state = this.getOrCreateWindow(entry.window);
      const current = state.accumulators.get(entry.key);
      state.accumulators.set(
        entry.key,
        current === undefined ? entry.accumulator : this.aggregateFunction.merge(current, entry.accumulator)
      );
    }
  }

  async *aggregate(
    elements: AsyncIterable<StreamElement<AccessLogRecord>>
  ): AsyncGenerator<StreamElement<WindowCountEvent>> {
    for await (const element of elements) {
      if (element.kind === 'record') {
        this.add(element.value, element.timestamp);
        continue;
      }

      for (const event of this.processWatermark(element.watermark)) {
        yield { kind: 'record', value: event, timestamp: event.windowEnd - 1 };
      }
      yield element;
    }
  }

  getCurrentWatermark(): number {
    return this.watermark;
  }

  getMetrics() {
    return { ...this.metrics, openWindows: this.windows.size };
  }

  clear(): void {
    this.windows.clear();
    this.timers.clear();
  }

  private getOrCreateWindow(window: WindowBounds): WindowState {
    let state = this.windows.get(window.end);
    if (!state) {
      state = { bounds: { start: window.start, end: window.end }, accumulators: new Map() };
      this.windows.set(window.end, state);
      this.timers.register(window.end, window.end);
    }
    return state;
  }
}
