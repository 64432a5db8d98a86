// src/core/extract/fields.ts
import type { AddressParts, ContactInfo, FieldResult, Rating } from '../types/index.js';
import type { DocumentTree } from './document.js';
import { SELECTORS, type Selector } from './selectors.js';

export type FieldExtractor<T> = (tree: DocumentTree) => FieldResult<T>;

const found = <T>(value: T): FieldResult<T> => ({ status: 'found', value });
const absent = <T>(): FieldResult<T> => ({ status: 'absent' });
const failed = <T>(error: Error): FieldResult<T> => ({ status: 'failed', error });

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function firstText(tree: DocumentTree, selector: Selector): FieldResult<string> {
  const node = tree.findFirst(selector.tag, selector.classSignature);
  if (!node) return absent();

  return found(cleanText(node.text()));
}

function allTexts(tree: DocumentTree, selector: Selector): FieldResult<string[]> {
  const texts = tree
    .findAll(selector.tag, selector.classSignature)
    .map(node => cleanText(node.text()));
  return found(texts);
}

export const extractName: FieldExtractor<string> = tree => firstText(tree, SELECTORS.name);

export const extractDescription: FieldExtractor<string> = tree =>
  firstText(tree, SELECTORS.description);

export const extractSaleText: FieldExtractor<string> = tree => firstText(tree, SELECTORS.sale);

export const extractAmenities: FieldExtractor<string[]> = tree => allTexts(tree, SELECTORS.amenity);

export const extractOverviewLabels: FieldExtractor<string[]> = tree => {
  const { tag, classSignature } = SELECTORS.overviewContainer;
  const labels = tree
    .findAll(tag, classSignature)
    .flatMap(container => container.findAll('a'))
    .map(link => cleanText(link.text()));
  return found(labels);
};

export type ContactChannel = keyof ContactInfo;

export function classifyHref(href: string): { channel: ContactChannel; value: string } {
  const lower = href.toLowerCase();
  if (lower.startsWith('mailto:')) {
    return { channel: 'email', value: href.slice('mailto:'.length) };
  }
  if (lower.startsWith('tel:')) {
    return { channel: 'phone', value: href.slice('tel:'.length) };
  }
  return { channel: 'homepage', value: href };
}

/**
 * Routes every linked href in the contact blocks to a channel. When a page
 * lists several links for one channel, the last one in document order wins.
 */
export const extractContact: FieldExtractor<ContactInfo> = tree => {
  const { tag, classSignature } = SELECTORS.contactContainer;
  const contact: ContactInfo = {};
  let matched = false;

  for (const container of tree.findAll(tag, classSignature)) {
    for (const link of container.findAll('a')) {
      const href = link.attribute('href')?.trim();
      if (!href) continue;

      const { channel, value } = classifyHref(href);
      contact[channel] = value;
      matched = true;
    }
  }

  return matched ? found(contact) : absent();
};

/**
 * Splits `"<street>, <postal code> <city>"` by position. The second segment
 * keeps its leading space, so the postal code is token 1 and the city token 2.
 */
export function splitAddress(text: string): FieldResult<AddressParts> {
  const rawSegments = text.split(',');
  if (rawSegments.length < 2) {
    return failed(new Error(`Expected "street, postal code city" but got ${rawSegments.length} segment(s): "${text}"`));
  }

  const tokens = rawSegments[1].split(' ');
  if (tokens.length < 3) {
    return failed(new Error(`Expected postal code and city in "${rawSegments[1]}"`));
  }

  return found({
    rawSegments,
    postalCode: tokens[1],
    city: tokens[2],
    street: rawSegments[0],
  });
}

export const extractAddress: FieldExtractor<AddressParts> = tree => {
  const { tag, classSignature } = SELECTORS.address;
  const node = tree.findFirst(tag, classSignature);
  return node ? splitAddress(node.text()) : absent();
};

export function parseRating(text: string): FieldResult<Rating> {
  const open = text.indexOf('(');
  if (open === -1) return absent();

  return found({
    score: text.slice(0, open).trim(),
    count: text.slice(open + 1).replace(/\)/g, '').trim(),
  });
}

export const extractRating: FieldExtractor<Rating> = tree => {
  const { tag, classSignature } = SELECTORS.rating;
  const node = tree.findFirst(tag, classSignature);
  return node ? parseRating(node.text()) : absent();
};

export const extractRatingFactors: FieldExtractor<string[]> = tree => {
  const { ratingFactor, ratingFactorLabel, ratingFactorValue } = SELECTORS;
  const factors: string[] = [];

  for (const item of tree.findAll(ratingFactor.tag, ratingFactor.classSignature)) {
    const label = item.findFirst(ratingFactorLabel.tag, ratingFactorLabel.classSignature);
    const value = item.findFirst(ratingFactorValue.tag, ratingFactorValue.classSignature);
    if (!label || !value) continue;

    factors.push(`${cleanText(label.text())}: ${cleanText(value.text())}`);
  }

  return found(factors);
};

export const extractImageUrls: FieldExtractor<string[]> = tree => {
  const { tag, classSignature } = SELECTORS.imageContainer;
  const urls: string[] = [];

  for (const container of tree.findAll(tag, classSignature)) {
    const src = container.findFirst('img')?.attribute('src');
    if (src) urls.push(src);
  }

  return found(urls);
};
