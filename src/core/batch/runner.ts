// src/core/batch/runner.ts
import { readFile } from 'node:fs/promises';
import pLimit from 'p-limit';
import { DEFAULT_CONCURRENCY } from '../config/constants.js';
import { ErrorManager } from '../error-manager.js';
import { ErrorCode, ScrapeError } from '../errors.js';
import type { DocumentLoader } from '../fetch/loader.js';
import { parseLocatorList } from '../fetch/utils.js';
import { logSafely } from '../logging.js';
import { FacilityScraper, type ItemState, type ScrapeOutcome } from '../scraper.js';
import type { ExtractionError, FacilityRecord, Logger, SourceLocator } from '../types/index.js';

// Helper function to read from stdin (extracted for testability)
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export interface BatchRunnerOptions {
  loader: DocumentLoader;
  errors?: ErrorManager;
  logger?: Logger;
}

export interface BatchOptions {
  concurrency?: number;
  quiet?: boolean;
}

export interface BatchItem {
  locator: SourceLocator;
  state: ItemState;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  fieldErrors: number;
  duration: number;
  failures: Array<{ url: string; error: string }>;
}

export interface BatchResult {
  /** One record per loaded locator, in input order */
  records: FacilityRecord[];
  /** Errors recorded during this run, in the order they happened */
  errors: ExtractionError[];
  items: BatchItem[];
  summary: BatchSummary;
}

export class BatchRunner {
  readonly errors: ErrorManager;
  private readonly loader: DocumentLoader;
  private readonly logger: Logger;

  constructor(options: BatchRunnerOptions) {
    this.loader = options.loader;
    this.logger = options.logger ?? console;
    this.errors = options.errors ?? new ErrorManager({ logger: this.logger });
  }

  async run(locators: SourceLocator[], options: BatchOptions = {}): Promise<BatchResult> {
    const startTime = Date.now();
    const errorOffset = this.errors.getErrors().length;
    const fieldErrorOffset = this.errors.count('field');
    const items: BatchItem[] = locators.map(locator => ({ locator, state: 'pending' }));

    const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);
    const scraper = new FacilityScraper(this.loader, this.errors);

    const outcomes = await Promise.all(
      items.map(item =>
        limit(async () => {
          const outcome = await scraper.scrape(item.locator, (_, state) => {
            item.state = state;
          });
          if (!options.quiet) {
            this.printProgress(outcome);
          }
          return outcome;
        })
      )
    );

    const records: FacilityRecord[] = [];
    const failures: BatchSummary['failures'] = [];
    for (const outcome of outcomes) {
      if (outcome.state === 'done') {
        records.push(outcome.record);
      } else {
        failures.push({ url: outcome.locator, error: outcome.error.message });
      }
    }

    const errors = this.errors.getErrors().slice(errorOffset);
    const summary: BatchSummary = {
      total: locators.length,
      succeeded: records.length,
      failed: failures.length,
      fieldErrors: this.errors.count('field') - fieldErrorOffset,
      duration: Date.now() - startTime,
      failures,
    };

    if (!options.quiet && locators.length > 0) {
      this.printSummary(summary);
    }

    return { records, errors, items, summary };
  }

  async parseUrls(
    source: 'file' | 'stdin',
    filePath?: string
  ): Promise<string[]> {
    let content: string;

    if (source === 'file') {
      if (!filePath) {
        throw new ScrapeError(
          ErrorCode.INVALID_CONFIG,
          'File path is required when source is "file"'
        );
      }
      content = await readFile(filePath, 'utf-8');
    } else {
      content = await readStdin();
    }

    return parseLocatorList(content);
  }

  private printProgress(outcome: ScrapeOutcome): void {
    if (outcome.state === 'done') {
      this.print(`✓ ${outcome.locator}`);
    } else {
      this.print(`✗ ${outcome.locator} (${outcome.error.code})`);
    }
  }

  private print(message: string): void {
    logSafely(this.logger, 'log', message);
  }

  private printSummary(summary: BatchSummary): void {
    this.print('\n' + '━'.repeat(50));
    this.print(
      `Summary: ${summary.succeeded} scraped, ${summary.failed} failed, ${summary.fieldErrors} field warnings, ${(summary.duration / 1000).toFixed(1)}s`
    );

    if (summary.failures.length > 0) {
      this.print('\nFailed URLs:');
      summary.failures.forEach(({ url, error }) => {
        this.print(`  - ${url}: ${error}`);
      });
    }
  }
}
