import { PipelineError } from './types';

export function parseTimeWindow(window: string): number {
  const match = window.match(/^(\d+)([smhd])$/);
  if (!match) {
    throw new Error(`Invalid time window format: ${window}`);
  }

  const value = parseInt(match[1], 10);
  const unit = match[2];

  switch (unit) {
    case "s":
      return value * 1000;
    case "m":
      return value * 60 * 1000;
    case "h":
      return value * 60 * 60 * 1000;
    case "d":
      return value * 24 * 60 * 60 * 1000;
    default:
      throw new Error(`Unknown time unit: ${unit}`);
  }
}

/**
 * Resolves a duration given either as whole seconds or as a window string ("10s", "5m").
 * Sub-second strings are rejected since event time has seconds resolution.
 */
export function toSeconds(value: string | number, name: string): number {
  let seconds: number;
  if (typeof value === 'number') {
    seconds = value;
  } else {
    let ms: number;
    try {
      ms = parseTimeWindow(value.trim());
    } catch (error) {
      throw new PipelineError(
        `Invalid ${name}: ${value}`,
        'INVALID_CONFIG',
        { option: name, error: error instanceof Error ? error.message : String(error) }
      );
    }
    seconds = ms / 1000;
  }

  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new PipelineError(
      `${name} must be a non-negative whole number of seconds`,
      'INVALID_CONFIG',
      { option: name, value }
    );
  }
  return seconds;
}

/** Modulo that stays non-negative for negative dividends */
export function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}
