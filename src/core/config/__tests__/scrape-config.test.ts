import { describe, it, expect } from '@jest/globals';
import { resolveScrapeConfig, type ScrapeConfigInput } from '../scrape-config.js';
import { DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT, MAX_TIMEOUT } from '../constants.js';
import { ErrorCode, ScrapeError } from '../../errors.js';

describe('resolveScrapeConfig', () => {
  it('uses defaults when nothing is given', () => {
    expect(resolveScrapeConfig()).toEqual({
      concurrency: DEFAULT_CONCURRENCY,
      timeout: DEFAULT_TIMEOUT,
    });
  });

  it('accepts numeric strings from the command line', () => {
    expect(resolveScrapeConfig({ concurrency: '8', timeout: ' 5000 ' })).toEqual({
      concurrency: 8,
      timeout: 5000,
    });
  });

  const rejects = (input: ScrapeConfigInput, message: string) => {
    expect.assertions(3);
    try {
      resolveScrapeConfig(input);
    } catch (err) {
      expect(err).toBeInstanceOf(ScrapeError);
      expect((err as ScrapeError).code).toBe(ErrorCode.INVALID_CONFIG);
      expect((err as ScrapeError).message).toBe(message);
    }
  };

  it('rejects a concurrency of zero', () => {
    rejects({ concurrency: 0 }, 'Invalid concurrency: 0');
  });

  it('rejects a concurrency above the limit', () => {
    rejects({ concurrency: 33 }, 'Invalid concurrency: 33');
  });

  it('rejects fractional values', () => {
    rejects({ concurrency: '2.5' }, 'Invalid concurrency: 2.5');
  });

  it('rejects a negative timeout', () => {
    rejects({ timeout: -1 }, 'Invalid timeout: -1');
  });

  it('rejects a timeout that is not a number', () => {
    rejects({ timeout: 'soon' }, 'Invalid timeout: soon');
  });

  it('rejects a timeout too large for a timer', () => {
    rejects({ timeout: '3000000000' }, 'Invalid timeout: 3000000000');
  });

  it('accepts the largest timer delay', () => {
    expect(resolveScrapeConfig({ timeout: MAX_TIMEOUT }).timeout).toBe(MAX_TIMEOUT);
  });
});
