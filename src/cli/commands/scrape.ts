// src/cli/commands/scrape.ts
import { Command } from 'commander';
import { BatchRunner } from '../../core/batch/runner.js';
import { DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT } from '../../core/config/constants.js';
import { resolveScrapeConfig } from '../../core/config/scrape-config.js';
import { ErrorManager } from '../../core/error-manager.js';
import { formatCsvOutput } from '../../core/export/csv.js';
import { formatJsonOutput } from '../../core/export/json.js';
import { parseOutputFormat, writeOutput } from '../../core/export/writer.js';
import { HttpDocumentLoader, type DocumentLoader } from '../../core/fetch/loader.js';
import type { Logger } from '../../core/types/index.js';

export interface ScrapeCommandOptions {
  file?: string;
  stdin?: boolean;
  concurrency: string;
  timeout: string;
  format: string;
  output?: string;
  quiet: boolean;
  failOnError: boolean;
}

export interface ScrapeDependencies {
  loader?: DocumentLoader;
}

export function registerScrapeCommand(program: Command): void {
  program
    .argument('[urls...]', 'Studio page URLs (optional if using --file or --stdin)')
    .option('--file <path>', 'Read URLs from file')
    .option('--stdin', 'Read URLs from stdin')
    .option('--concurrency <n>', 'Pages fetched in parallel', String(DEFAULT_CONCURRENCY))
    .option('--timeout <ms>', 'Request timeout per page in milliseconds', String(DEFAULT_TIMEOUT))
    .option('--format <format>', 'Output format (json|csv)', 'json')
    .option('--output <path>', 'Write output to a file instead of stdout')
    .option('--quiet', 'Suppress progress output and field warnings', false)
    .option('--fail-on-error', 'Exit with code 1 when a page could not be loaded', false)
    .action(async (urls: string[], options: ScrapeCommandOptions) => {
      await handleScrape(urls, options);
    });
}

export async function handleScrape(
  urls: string[],
  options: ScrapeCommandOptions,
  deps: ScrapeDependencies = {}
): Promise<void> {
  // Progress goes to stderr when the export itself is written to stdout
  const logger: Logger = options.output
    ? console
    : { log: console.error, warn: console.warn, error: console.error };

  try {
    const format = parseOutputFormat(options.format);
    const config = resolveScrapeConfig({
      concurrency: options.concurrency,
      timeout: options.timeout,
    });

    const runner = new BatchRunner({
      loader: deps.loader ?? new HttpDocumentLoader({ timeout: config.timeout }),
      errors: new ErrorManager({ logger, quiet: options.quiet }),
      logger,
    });

    const locators = [...urls];
    if (options.file) {
      locators.push(...(await runner.parseUrls('file', options.file)));
    }
    if (options.stdin) {
      locators.push(...(await runner.parseUrls('stdin')));
    }

    if (locators.length === 0) {
      console.error('Error: URL argument or --file/--stdin is required');
      process.exit(1);
      return;
    }

    const result = await runner.run(locators, {
      concurrency: config.concurrency,
      quiet: options.quiet,
    });

    const content = format === 'csv'
      ? formatCsvOutput(result.records)
      : formatJsonOutput(result) + '\n';

    if (options.output) {
      await writeOutput(content, options.output);
      if (!options.quiet) {
        logger.log(`Exported ${result.records.length} record(s) to: ${options.output}`);
      }
    } else {
      process.stdout.write(content);
    }

    if (options.failOnError && result.summary.failed > 0) {
      process.exit(1);
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
