// src/core/export/json.ts
import type { BatchResult } from '../batch/runner.js';

export function buildJsonExport(result: BatchResult): Pick<BatchResult, 'records' | 'errors' | 'summary'> {
  return {
    records: result.records,
    errors: result.errors,
    summary: result.summary,
  };
}

export function formatJsonOutput(result: BatchResult): string {
  return JSON.stringify(buildJsonExport(result), null, 2);
}
