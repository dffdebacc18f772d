import { EventEmitter } from 'eventemitter3';
import { PipelineError, RankedReport, StreamElement, Watermark, WindowCountEvent } from './types';
import { TimerService } from './timer-service';

export interface TopNSelectorOptions {
  topSize: number;
}

export interface TopNSelectorEvents {
  report: (report: RankedReport) => void;
}

/**
 * Ranks the per-key window counts of each window end.
 * Counts are buffered per windowEnd; a timer at windowEnd + 1 fires after every
 * aggregator emission for that window, ranks the buffer, and discards it.
 */
export class TopNSelector extends EventEmitter<TopNSelectorEvents> {
  private buffers: Map<number, WindowCountEvent[]> = new Map();
  private timers = new TimerService<number>();
  private watermark = Number.NEGATIVE_INFINITY;
  private readonly topSize: number;

  constructor(options: TopNSelectorOptions) {
    super();
    if (!Number.isInteger(options.topSize) || options.topSize <= 0) {
      throw new PipelineError('Top-N size must be a positive integer', 'INVALID_CONFIG', { topSize: options.topSize });
    }
    this.topSize = options.topSize;
  }

  processElement(event: WindowCountEvent): void {
    let buffer = this.buffers.get(event.windowEnd);
    if (!buffer) {
      buffer = [];
      this.buffers.set(event.windowEnd, buffer);
    }
    buffer.push(event);
    this.timers.register(event.windowEnd, event.windowEnd + 1);
  }

  processWatermark(watermark: Watermark): RankedReport[] {
    if (watermark.timestamp <= this.watermark) {
      return [];
    }
    this.watermark = watermark.timestamp;

    const reports: RankedReport[] = [];
    for (const timer of this.timers.advanceTo(watermark.timestamp)) {
      const report = this.fire(timer.key);
      if (report) {
        reports.push(report);
        this.emit('report', report);
      }
    }
    return reports;
  }

  async *select(elements: AsyncIterable<StreamElement<WindowCountEvent>>): AsyncGenerator<RankedReport> {
    for await (const element of elements) {
      if (element.kind === 'record') {
        this.processElement(element.value);
      } else {
        yield* this.processWatermark(element.watermark);
      }
    }
  }

  getBufferedCount(windowEnd: number): number {
    return this.buffers.get(windowEnd)?.length ?? 0;
  }

  getPendingWindows(): number[] {
    return [...this.buffers.keys()].sort((a, b) => a - b);
  }

  clear(): void {
    this.buffers.clear();
    this.timers.clear();
  }

  private fire(windowEnd: number): RankedReport | undefined {
    const buffered = this.buffers.get(windowEnd);
    this.buffers.delete(windowEnd);

    if (!buffered || buffered.length === 0) {
      return undefined;
    }

    // Equal counts keep no defined relative order
    const ranked = [...buffered].sort((a, b) => b.count - a.count);

    return {
      windowEnd,
      entries: ranked.slice(0, this.topSize).map((event) => ({
        requestPath: event.requestPath,
        count: event.count
      }))
    };
  }
}
