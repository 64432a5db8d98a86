// src/core/extract/document.ts
import * as cheerio from 'cheerio';
import type { AnyNode, Element } from 'domhandler';

/**
 * Splits a class signature such as `"MuiTypography-root css-2g7rhg"` into
 * tokens. An element matches when it carries every token.
 */
export function classTokens(classSignature?: string): string[] {
  if (!classSignature) return [];
  return classSignature.split(/\s+/).filter(token => token.length > 0);
}

abstract class QueryScope {
  protected constructor(protected readonly $: cheerio.CheerioAPI) {}

  protected abstract scope(): cheerio.Cheerio<AnyNode>;

  findAll(tag: string, classSignature?: string): DocumentNode[] {
    const tokens = classTokens(classSignature);
    return this.scope()
      .find(tag)
      .toArray()
      .filter((el: Element) => tokens.every(token => this.$(el).hasClass(token)))
      .map((el: Element) => new DocumentNode(this.$, el));
  }

  findFirst(tag: string, classSignature?: string): DocumentNode | undefined {
    return this.findAll(tag, classSignature)[0];
  }
}

export class DocumentNode extends QueryScope {
  constructor($: cheerio.CheerioAPI, private readonly element: Element) {
    super($);
  }

  protected scope(): cheerio.Cheerio<AnyNode> {
    return this.$(this.element);
  }

  get tagName(): string {
    return this.element.tagName.toLowerCase();
  }

  text(): string {
    return this.$(this.element).text();
  }

  attribute(name: string): string | undefined {
    return this.$(this.element).attr(name);
  }
}

export class DocumentTree extends QueryScope {
  constructor($: cheerio.CheerioAPI) {
    super($);
  }

  protected scope(): cheerio.Cheerio<AnyNode> {
    return this.$.root();
  }
}

export function parseDocument(html: string): DocumentTree {
  return new DocumentTree(cheerio.load(html));
}
