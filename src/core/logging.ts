// src/core/logging.ts
import { toError } from './errors.js';
import type { Logger } from './types/index.js';

/** Writes one line through the logger; a throwing logger falls back to stderr. */
export function logSafely(logger: Logger, level: keyof Logger, message: string): void {
  try {
    logger[level](message);
  } catch (error) {
    // logging is terminal
    process.stderr.write(`${message} (logger failed: ${toError(error).message})\n`);
  }
}
