// src/core/errors.ts
import type { RetrievalError, SourceLocator } from './types/index.js';

export enum ErrorCode {
  NETWORK_ERROR = 'network_error',
  TIMEOUT = 'timeout',
  HTTP_ERROR = 'http_error',
  INVALID_URL = 'invalid_url',
  INVALID_CONFIG = 'invalid_config',
  EXTRACT_FAILED = 'extract_failed',
  EXPORT_FAILED = 'export_failed',
}

export class ScrapeError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ScrapeError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function toError(cause: unknown): Error {
  return cause instanceof Error ? cause : new Error(String(cause));
}

export function createRetrievalError(locator: SourceLocator, cause: unknown): RetrievalError {
  if (cause instanceof ScrapeError) {
    return {
      kind: 'retrieval',
      locator,
      code: cause.code,
      message: cause.message,
      retryable: cause.retryable,
    };
  }

  return {
    kind: 'retrieval',
    locator,
    code: ErrorCode.NETWORK_ERROR,
    message: toError(cause).message,
    retryable: false,
  };
}
