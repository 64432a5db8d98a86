export * from './core/types/index.js';
export { ScrapeError, ErrorCode } from './core/errors.js';
export { ErrorManager, type ErrorManagerOptions } from './core/error-manager.js';
export { resolveScrapeConfig, type ScrapeConfig } from './core/config/scrape-config.js';
export { HttpDocumentLoader, type DocumentLoader, type HttpLoaderOptions } from './core/fetch/loader.js';
export { DocumentTree, DocumentNode, parseDocument } from './core/extract/document.js';
export * from './core/extract/fields.js';
export { RecordAssembler, extractFacility } from './core/extract/assembler.js';
export { FacilityScraper, type ItemState, type ScrapeOutcome } from './core/scraper.js';
export { BatchRunner, type BatchOptions, type BatchResult, type BatchSummary } from './core/batch/runner.js';
export { formatCsvOutput } from './core/export/csv.js';
export { formatJsonOutput } from './core/export/json.js';
