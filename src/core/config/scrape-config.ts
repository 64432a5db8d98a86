import { DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT, MAX_CONCURRENCY, MAX_TIMEOUT } from './constants.js';
import { ErrorCode, ScrapeError } from '../errors.js';

export interface ScrapeConfig {
  concurrency: number;
  timeout: number;
}

export interface ScrapeConfigInput {
  concurrency?: number | string;
  timeout?: number | string;
}

function toInteger(value: number | string, option: string): number {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ScrapeError(
      ErrorCode.INVALID_CONFIG,
      `Invalid ${option}: ${value}`,
      false,
      `${option} must be a whole number`
    );
  }
  return parsed;
}

export function resolveScrapeConfig(input: ScrapeConfigInput = {}): ScrapeConfig {
  const concurrency = input.concurrency === undefined
    ? DEFAULT_CONCURRENCY
    : toInteger(input.concurrency, 'concurrency');
  const timeout = input.timeout === undefined
    ? DEFAULT_TIMEOUT
    : toInteger(input.timeout, 'timeout');

  if (concurrency < 1 || concurrency > MAX_CONCURRENCY) {
    throw new ScrapeError(
      ErrorCode.INVALID_CONFIG,
      `Invalid concurrency: ${concurrency}`,
      false,
      `Use a value between 1 and ${MAX_CONCURRENCY}`
    );
  }

  if (timeout <= 0 || timeout > MAX_TIMEOUT) {
    throw new ScrapeError(
      ErrorCode.INVALID_CONFIG,
      `Invalid timeout: ${timeout}`,
      false,
      `Timeout is given in milliseconds, between 1 and ${MAX_TIMEOUT}`
    );
  }

  return { concurrency, timeout };
}
