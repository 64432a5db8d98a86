// src/core/fetch/loader.ts
import { DEFAULT_ACCEPT_LANGUAGE, DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from '../config/constants.js';
import { ErrorCode, ScrapeError } from '../errors.js';
import type { SourceLocator } from '../types/index.js';
import { isValidUrl, normalizeUrl } from './utils.js';

export interface DocumentLoader {
  load(locator: SourceLocator): Promise<string>;
}

export interface HttpLoaderOptions {
  timeout?: number;
  userAgent?: string;
  acceptLanguage?: string;
}

/**
 * Retrieves raw page markup over HTTP.
 *
 * Rejects with a `ScrapeError` for invalid locators, network failures,
 * timeouts and non-2xx responses.
 */
export class HttpDocumentLoader implements DocumentLoader {
  private readonly timeout: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpLoaderOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.headers = {
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': options.acceptLanguage ?? DEFAULT_ACCEPT_LANGUAGE,
    };
  }

  async load(locator: SourceLocator): Promise<string> {
    if (!isValidUrl(locator)) {
      throw new ScrapeError(ErrorCode.INVALID_URL, `Invalid URL: ${locator}`);
    }

    const url = normalizeUrl(locator);
    let response: Response;

    try {
      response = await fetch(url, {
        headers: this.headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      throw this.toScrapeError(url, error);
    }

    if (!response.ok) {
      throw new ScrapeError(
        ErrorCode.HTTP_ERROR,
        `HTTP ${response.status} for ${url}`,
        response.status >= 500 || response.status === 429,
        undefined,
        { url, status: response.status }
      );
    }

    return response.text();
  }

  private toScrapeError(url: string, error: unknown): ScrapeError {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new ScrapeError(
        ErrorCode.TIMEOUT,
        `Request timed out after ${this.timeout}ms: ${url}`,
        true,
        'Increase --timeout or retry later',
        { url }
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ScrapeError(
      ErrorCode.NETWORK_ERROR,
      `Failed to fetch ${url}: ${message}`,
      true,
      'Check your internet connection',
      { url }
    );
  }
}
