// src/core/scraper.ts
import type { ErrorManager } from './error-manager.js';
import { RecordAssembler } from './extract/assembler.js';
import { parseDocument } from './extract/document.js';
import type { DocumentLoader } from './fetch/loader.js';
import type { FacilityRecord, RetrievalError, SourceLocator } from './types/index.js';

export type ItemState =
  | 'pending'
  | 'loading'
  | 'load_failed'
  | 'parsed'
  | 'extracting'
  | 'done';

export type ScrapeOutcome =
  | { state: 'done'; locator: SourceLocator; record: FacilityRecord }
  | { state: 'load_failed'; locator: SourceLocator; error: RetrievalError };

export type StateListener = (locator: SourceLocator, state: ItemState) => void;

/**
 * Runs Load → Parse → Extract for a single locator. A load failure
 * resolves to `load_failed`; a successful load always resolves to `done`
 * with a possibly sparse record.
 */
export class FacilityScraper {
  private readonly assembler: RecordAssembler;

  constructor(
    private readonly loader: DocumentLoader,
    private readonly errors: ErrorManager
  ) {
    this.assembler = new RecordAssembler(errors);
  }

  async scrape(locator: SourceLocator, onState?: StateListener): Promise<ScrapeOutcome> {
    const emit = (state: ItemState) => onState?.(locator, state);

    emit('loading');
    let html: string;
    try {
      html = await this.loader.load(locator);
    } catch (cause) {
      emit('load_failed');
      return {
        state: 'load_failed',
        locator,
        error: this.errors.reportRetrievalError(locator, cause),
      };
    }

    const tree = parseDocument(html);
    emit('parsed');

    emit('extracting');
    const record = this.assembler.assemble(tree, locator);
    emit('done');

    return { state: 'done', locator, record };
  }
}
