import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { isBracketed, normalizeWhitespace } from "../utils/text";

export const DESCRIPTION_SELECTOR = "div.cardDescription";
const DESCRIPTION_BODY_SELECTOR = `${DESCRIPTION_SELECTOR} p`;
const JSON_LD_SELECTOR = 'script[type="application/ld+json"]';
const LINE_BREAK = /<br\s*\/?>/i;

function fragmentText(fragment: string): string {
  return normalizeWhitespace(cheerio.load(fragment, undefined, false).text());
}

function splitLines(element: cheerio.Cheerio<AnyNode>): string[] {
  const html = element.html() ?? "";
  return html
    .split(LINE_BREAK)
    .map(fragmentText)
    .filter((line) => line.length > 0);
}

/**
 * Read-only view over one detail page. The description box is split into lines once at
 * construction; everything else is answered by selector queries against the parsed tree.
 */
export class MarkupDocument {
  readonly url: string;
  readonly descriptionLines: readonly string[];
  private readonly $: cheerio.CheerioAPI;

  constructor(html: string, url: string) {
    this.url = url;
    this.$ = cheerio.load(html);
    // Some pages keep the lines directly in the description box without a <p>.
    const paragraph = this.$(DESCRIPTION_BODY_SELECTOR).first();
    const body = paragraph.length ? paragraph : this.$(DESCRIPTION_SELECTOR).first();
    this.descriptionLines = Object.freeze(body.length ? splitLines(body) : []);
  }

  has(selector: string): boolean {
    return this.$(selector).length > 0;
  }

  /** Normalized text of the first match, or null when nothing matches. */
  text(selector: string): string | null {
    const element = this.$(selector).first();
    if (!element.length) return null;
    return normalizeWhitespace(element.text());
  }

  attr(selector: string, name: string): string | null {
    const value = this.$(selector).first().attr(name)?.trim();
    return value ? value : null;
  }

  /** Description lines wrapped in 【…】: the category line and, for Link monsters, the arrows. */
  get headerLines(): string[] {
    return this.descriptionLines.filter(isBracketed);
  }

  /** Every JSON-LD block that parses; malformed blocks are left out. */
  jsonLd(): unknown[] {
    return this.$(JSON_LD_SELECTOR)
      .toArray()
      .map((node) => parseJson(this.$(node).text()))
      .filter((value) => value !== null);
  }
}

function parseJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) return null;
    throw error;
  }
}

export function parseMarkup(html: string, url: string): MarkupDocument {
  return new MarkupDocument(html, url);
}
