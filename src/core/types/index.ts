// src/core/types/index.ts
export type SourceLocator = string;

export interface ContactInfo {
  email?: string;
  homepage?: string;
  phone?: string;
}

export interface AddressParts {
  rawSegments: string[];
  postalCode?: string;
  city?: string;
  street?: string;
}

export interface Rating {
  score: string;
  count: string;
}

export interface FacilityRecord {
  sourceUrl: SourceLocator;
  name?: string;
  overviewLabels: string[];
  contact: ContactInfo;
  address?: AddressParts;
  description?: string;
  rating?: Rating;
  ratingFactors: string[];
  amenities: string[];
  saleText?: string;
  imageUrls: string[];
  fetchedAt: string;
}

export type FieldName =
  | 'name'
  | 'overviewLabels'
  | 'contact'
  | 'address'
  | 'description'
  | 'rating'
  | 'ratingFactors'
  | 'amenities'
  | 'saleText'
  | 'imageUrls';

export type FieldResult<T> =
  | { status: 'found'; value: T }
  | { status: 'absent' }
  | { status: 'failed'; error: Error };

export type RetrievalError = {
  kind: 'retrieval';
  locator: SourceLocator;
  code: string;
  message: string;
  retryable: boolean;
};

export type FieldError = {
  kind: 'field';
  fieldName: FieldName;
  locator?: SourceLocator;
  message: string;
};

export type ExtractionError = RetrievalError | FieldError;

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
