// src/core/export/writer.ts
import * as fs from 'fs/promises';
import { dirname } from 'path';
import { ErrorCode, ScrapeError } from '../errors.js';

export type OutputFormat = 'json' | 'csv';

export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'json' || value === 'csv') {
    return value;
  }
  throw new ScrapeError(
    ErrorCode.INVALID_CONFIG,
    `Invalid format: ${value}. Use json or csv`
  );
}

export async function writeOutput(content: string, outputPath: string): Promise<void> {
  try {
    await fs.mkdir(dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, content, 'utf-8');
  } catch (error) {
    throw new ScrapeError(
      ErrorCode.EXPORT_FAILED,
      `Failed to write ${outputPath}: ${error instanceof Error ? error.message : String(error)}`,
      false,
      'Check that the output directory is writable',
      { outputPath }
    );
  }
}
