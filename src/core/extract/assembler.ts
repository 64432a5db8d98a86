// src/core/extract/assembler.ts
import type { ErrorManager } from '../error-manager.js';
import type { FacilityRecord, FieldName, SourceLocator } from '../types/index.js';
import { parseDocument, type DocumentTree } from './document.js';
import {
  extractAddress,
  extractAmenities,
  extractContact,
  extractDescription,
  extractImageUrls,
  extractName,
  extractOverviewLabels,
  extractRating,
  extractRatingFactors,
  extractSaleText,
  type FieldExtractor,
} from './fields.js';

export class RecordAssembler {
  constructor(private readonly errors: ErrorManager) {}

  assemble(tree: DocumentTree, locator: SourceLocator): FacilityRecord {
    const run = <T>(field: FieldName, extractor: FieldExtractor<T>): T | undefined =>
      this.runField(field, extractor, tree, locator);

    return {
      sourceUrl: locator,
      name: run('name', extractName),
      overviewLabels: run('overviewLabels', extractOverviewLabels) ?? [],
      contact: run('contact', extractContact) ?? {},
      address: run('address', extractAddress),
      description: run('description', extractDescription),
      rating: run('rating', extractRating),
      ratingFactors: run('ratingFactors', extractRatingFactors) ?? [],
      amenities: run('amenities', extractAmenities) ?? [],
      saleText: run('saleText', extractSaleText),
      imageUrls: run('imageUrls', extractImageUrls) ?? [],
      fetchedAt: new Date().toISOString(),
    };
  }

  private runField<T>(
    field: FieldName,
    extractor: FieldExtractor<T>,
    tree: DocumentTree,
    locator: SourceLocator
  ): T | undefined {
    try {
      const result = extractor(tree);
      if (result.status === 'found') {
        return result.value;
      }
      if (result.status === 'failed') {
        this.errors.reportFieldError(field, result.error, locator);
      }
      return undefined;
    } catch (error) {
      this.errors.reportFieldError(field, error, locator);
      return undefined;
    }
  }
}

export function extractFacility(
  html: string,
  locator: SourceLocator,
  errors: ErrorManager
): FacilityRecord {
  return new RecordAssembler(errors).assemble(parseDocument(html), locator);
}
