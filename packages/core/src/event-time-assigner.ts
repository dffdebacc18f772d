import { AccessLogRecord, StreamElement, Watermark } from './types';

export interface EventTimeAssignerOptions {
  /** Seconds a record may trail the newest event time and still be counted */
  allowedLateness: number;
  /** Emit a +Infinity watermark once the input is exhausted */
  emitFinalWatermark?: boolean;
}

/**
 * Bounded-out-of-orderness timestamp assigner.
 * The watermark trails the largest event time seen by allowedLateness and never moves back.
 */
export class EventTimeAssigner {
  private maxEventTime = Number.NEGATIVE_INFINITY;
  private watermark: Watermark = { timestamp: Number.NEGATIVE_INFINITY };
  private readonly emitFinalWatermark: boolean;

  constructor(private options: EventTimeAssignerOptions) {
    this.emitFinalWatermark = options.emitFinalWatermark ?? true;
  }

  extractTimestamp(record: AccessLogRecord): number {
    return record.eventTime;
  }

  /**
   * Folds an event time into the running maximum.
   * @returns the new watermark if it advanced
   */
  observe(eventTime: number): Watermark | undefined {
    this.maxEventTime = Math.max(this.maxEventTime, eventTime);
    const candidate = this.maxEventTime - this.options.allowedLateness;

    if (candidate > this.watermark.timestamp) {
      this.watermark = { timestamp: candidate };
      return this.watermark;
    }
    return undefined;
  }

  getCurrentWatermark(): Watermark {
    return this.watermark;
  }

  async *assign(records: AsyncIterable<AccessLogRecord>): AsyncGenerator<StreamElement<AccessLogRecord>> {
    for await (const record of records) {
      const timestamp = this.extractTimestamp(record);
      yield { kind: 'record', value: record, timestamp };

      const advanced = this.observe(timestamp);
      if (advanced) {
        yield { kind: 'watermark', watermark: advanced };
      }
    }

    if (this.emitFinalWatermark) {
      yield { kind: 'watermark', watermark: this.close() };
    }
  }

  /**
   * Marks the input as exhausted; every window and timer becomes due
   */
  close(): Watermark {
    this.watermark = { timestamp: Number.POSITIVE_INFINITY };
    return this.watermark;
  }
}
