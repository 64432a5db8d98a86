// src/core/error-manager.ts
import { createRetrievalError, toError } from './errors.js';
import { logSafely } from './logging.js';
import type {
  ExtractionError,
  FieldError,
  FieldName,
  Logger,
  RetrievalError,
  SourceLocator,
} from './types/index.js';

export interface ErrorManagerOptions {
  logger?: Logger;
  /** Record field warnings without printing them */
  quiet?: boolean;
}

/**
 * Append-only log of everything that went wrong during a batch.
 *
 * Retrieval failures are hard errors for one locator; field failures are
 * soft warnings for one field of one record. Reporting never throws.
 */
export class ErrorManager {
  private readonly errors: ExtractionError[] = [];
  private readonly logger: Logger;
  private readonly quiet: boolean;

  constructor(options: ErrorManagerOptions = {}) {
    this.logger = options.logger ?? console;
    this.quiet = options.quiet ?? false;
  }

  reportRetrievalError(locator: SourceLocator, cause: unknown): RetrievalError {
    const entry = createRetrievalError(locator, cause);
    this.errors.push(entry);
    logSafely(this.logger, 'error', `Error accessing URL '${locator}': ${entry.message}`);
    return entry;
  }

  reportFieldError(fieldName: FieldName, cause: unknown, locator?: SourceLocator): FieldError {
    const entry: FieldError = {
      kind: 'field',
      fieldName,
      locator,
      message: toError(cause).message,
    };
    this.errors.push(entry);
    if (!this.quiet) {
      const where = locator ? ` on '${locator}'` : '';
      logSafely(this.logger, 'warn', `Error accessing element '${fieldName}'${where}: ${entry.message}`);
    }
    return entry;
  }

  getErrors(): ExtractionError[] {
    return [...this.errors];
  }

  getRetrievalErrors(): RetrievalError[] {
    return this.errors.filter((e): e is RetrievalError => e.kind === 'retrieval');
  }

  getFieldErrors(): FieldError[] {
    return this.errors.filter((e): e is FieldError => e.kind === 'field');
  }

  count(kind: ExtractionError['kind']): number {
    return this.errors.filter(e => e.kind === kind).length;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }
}
