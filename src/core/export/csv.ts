// src/core/export/csv.ts
import { LIST_SEPARATOR } from '../config/constants.js';
import type { FacilityRecord } from '../types/index.js';

type Column = [header: string, value: (record: FacilityRecord) => string | undefined];

const join = (values: string[]): string => values.join(LIST_SEPARATOR);

export const CSV_COLUMNS: Column[] = [
  ['Name', r => r.name],
  ['Overview', r => join(r.overviewLabels)],
  ['EMail', r => r.contact.email],
  ['Homepage', r => r.contact.homepage],
  ['Phone', r => r.contact.phone],
  ['Street', r => r.address?.street],
  ['PostalCode', r => r.address?.postalCode],
  ['City', r => r.address?.city],
  ['Address', r => r.address && r.address.rawSegments.join(',')],
  ['Description', r => r.description],
  ['Rating', r => r.rating?.score],
  ['RatingCount', r => r.rating?.count],
  ['RatingFactors', r => join(r.ratingFactors)],
  ['Amenities', r => join(r.amenities)],
  ['Sale', r => r.saleText],
  ['Images', r => join(r.imageUrls)],
  ['SourceUrl', r => r.sourceUrl],
];

export function escapeCsvValue(value: string | undefined): string {
  if (value === undefined) return '';
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvOutput(records: FacilityRecord[]): string {
  const lines = [CSV_COLUMNS.map(([header]) => header).join(',')];

  for (const record of records) {
    lines.push(CSV_COLUMNS.map(([, value]) => escapeCsvValue(value(record))).join(','));
  }

  return lines.join('\n') + '\n';
}
