import { PipelineError, WindowBounds } from './types';
import { floorMod } from './utils';

export interface WindowAssignerOptions {
  /** Window length in seconds */
  size: number;
  /** Distance between window starts in seconds; equal to size for tumbling windows */
  slide?: number;
}

/**
 * Fixed-width event-time windows. With slide === size every timestamp lands in
 * exactly one window [floor(t/size)*size, floor(t/size)*size + size).
 */
export class SlidingWindowAssigner {
  readonly size: number;
  readonly slide: number;

  constructor(options: WindowAssignerOptions) {
    const slide = options.slide ?? options.size;

    if (!Number.isInteger(options.size) || options.size <= 0) {
      throw new PipelineError('Window size must be a positive whole number of seconds', 'INVALID_CONFIG', { size: options.size });
    }
    if (!Number.isInteger(slide) || slide <= 0) {
      throw new PipelineError('Window slide must be a positive whole number of seconds', 'INVALID_CONFIG', { slide });
    }
    if (slide > options.size) {
      throw new PipelineError('Window slide must not exceed the window size', 'INVALID_CONFIG', { size: options.size, slide });
    }

    this.size = options.size;
    this.slide = slide;
  }

  assignWindows(timestamp: number): WindowBounds[] {
    const windows: WindowBounds[] = [];
    const lastStart = timestamp - floorMod(timestamp, this.slide);

    for (let start = lastStart; start > timestamp - this.size; start -= this.slide) {
      windows.push({ start, end: start + this.size });
    }

    return windows;
  }

  isTumbling(): boolean {
    return this.slide === this.size;
  }
}
