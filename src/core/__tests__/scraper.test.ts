import { describe, it, expect, jest } from '@jest/globals';
import { FacilityScraper, type ItemState } from '../scraper.js';
import { ErrorManager } from '../error-manager.js';
import { ErrorCode, ScrapeError } from '../errors.js';
import type { DocumentLoader } from '../fetch/loader.js';

const STUDIO = 'https://www.example.com/s/poda';

function createErrors(): ErrorManager {
  return new ErrorManager({ logger: { log: jest.fn(), warn: jest.fn(), error: jest.fn() } });
}

describe('FacilityScraper', () => {
  it('walks loading, parsed, extracting and done for a loaded page', async () => {
    const loader: DocumentLoader = { load: async () => '<p>no studio markup</p>' };
    const states: ItemState[] = [];

    const outcome = await new FacilityScraper(loader, createErrors()).scrape(STUDIO, (_, state) => {
      states.push(state);
    });

    expect(states).toEqual(['loading', 'parsed', 'extracting', 'done']);
    expect(outcome.state).toBe('done');
    if (outcome.state === 'done') {
      expect(outcome.record.sourceUrl).toBe(STUDIO);
      expect(outcome.record.overviewLabels).toEqual([]);
    }
  });

  it('stops at load_failed and reports one retrieval error', async () => {
    const loader: DocumentLoader = {
      load: async () => {
        throw new ScrapeError(ErrorCode.TIMEOUT, 'Request timed out', true);
      },
    };
    const errors = createErrors();
    const states: ItemState[] = [];

    const outcome = await new FacilityScraper(loader, errors).scrape(STUDIO, (_, state) => {
      states.push(state);
    });

    expect(states).toEqual(['loading', 'load_failed']);
    expect(outcome).toEqual({
      state: 'load_failed',
      locator: STUDIO,
      error: {
        kind: 'retrieval',
        locator: STUDIO,
        code: 'timeout',
        message: 'Request timed out',
        retryable: true,
      },
    });
    expect(errors.getErrors()).toHaveLength(1);
  });
});
