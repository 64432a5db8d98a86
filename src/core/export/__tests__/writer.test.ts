import { describe, it, expect } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseOutputFormat, writeOutput } from '../writer.js';
import { ErrorCode, ScrapeError } from '../../errors.js';

describe('parseOutputFormat', () => {
  it('accepts json and csv', () => {
    expect(parseOutputFormat('json')).toBe('json');
    expect(parseOutputFormat('csv')).toBe('csv');
  });

  it('rejects anything else', () => {
    expect(() => parseOutputFormat('xlsx')).toThrow('Invalid format: xlsx. Use json or csv');
  });
});

describe('writeOutput', () => {
  it('creates missing directories', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'studio-writer-'));
    try {
      const target = join(dir, 'out', 'studios.csv');
      await writeOutput('Name\n', target);

      expect(await readFile(target, 'utf-8')).toBe('Name\n');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('wraps write failures in an export error', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'studio-writer-'));
    try {
      const blocker = join(dir, 'file');
      await writeFile(blocker, 'x');

      await expect(writeOutput('Name\n', join(blocker, 'studios.csv'))).rejects.toMatchObject({
        name: 'ScrapeError',
        code: ErrorCode.EXPORT_FAILED,
      });
      await expect(writeOutput('Name\n', join(blocker, 'studios.csv'))).rejects.toBeInstanceOf(ScrapeError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
