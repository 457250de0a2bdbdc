import { z } from "zod";
import { MarkupDocument } from "../dom/markupDocument";
import { ExtractionError } from "../errors";
import { resolveImageReference, CARD_IMAGE_SELECTOR } from "../image/imageReference";
import { StatValue } from "../types/card";
import { isBracketed } from "../utils/text";

const JsonLdNameSchema = z.object({ name: z.string().min(1) });

const STATS_PATTERN =
  /^(星|ランク|LINK-)\s*(\S+?)\s*[/／]\s*(\S+?)\s*[/／]\s*(\S+族)\s*[/／]\s*攻\s*(\S+?)(?:\s*[/／]\s*守\s*(\S*))?$/;
const RESTRICTION_PATTERN = /^[(（](?:制限|準制限|禁止)カード[)）]$/;
const LINK_ARROWS_PATTERN = /【LINK-\d+[：:](.*?)】/;

export type StatsPrefix = "星" | "ランク" | "LINK-";

export interface StatsLine {
  prefix: StatsPrefix;
  value: StatValue;
  element: string;
  race: string;
  attack: StatValue;
  defense: StatValue | null;
}

export interface CardBaseFields {
  card_name: string;
  image: string;
}

export function parseStat(raw: string): StatValue {
  return /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : { placeholder: raw };
}

function isStatsPrefix(value: string): value is StatsPrefix {
  return value === "星" || value === "ランク" || value === "LINK-";
}

export function parseStatsLine(line: string): StatsLine | null {
  const match = STATS_PATTERN.exec(line);
  if (!match || !isStatsPrefix(match[1])) return null;
  const defense = match[6];
  return {
    prefix: match[1],
    value: parseStat(match[2]),
    element: match[3],
    race: match[4],
    attack: parseStat(match[5]),
    defense: defense === undefined || defense === "" ? null : parseStat(defense)
  };
}

function isBodyLine(line: string): boolean {
  return !isBracketed(line) && !RESTRICTION_PATTERN.test(line) && parseStatsLine(line) === null;
}

export function readCardName(doc: MarkupDocument): string {
  for (const block of doc.jsonLd()) {
    const parsed = JsonLdNameSchema.safeParse(block);
    if (parsed.success) return parsed.data.name;
  }
  const alt = doc.attr(CARD_IMAGE_SELECTOR, "alt");
  if (alt) return alt;
  throw new ExtractionError(doc.url, "card_name");
}

export function readBaseFields(doc: MarkupDocument): CardBaseFields {
  return {
    card_name: readCardName(doc),
    image: resolveImageReference(doc).filename
  };
}

/** Card text lines: everything in the description box after headers, stats and restriction tags. */
export function readBodyLines(doc: MarkupDocument): string[] {
  if (doc.descriptionLines.length === 0) {
    throw new ExtractionError(doc.url, "description");
  }
  return doc.descriptionLines.filter(isBodyLine);
}

export function readCardText(doc: MarkupDocument): string {
  const text = readBodyLines(doc).join(" ");
  if (!text) {
    throw new ExtractionError(doc.url, "text");
  }
  return text;
}

/** First body line is the summoning materials; the rest is the effect text. */
export function readMaterialsAndText(doc: MarkupDocument): { materials: string; text: string } {
  const [materials, ...rest] = readBodyLines(doc);
  if (!materials) {
    throw new ExtractionError(doc.url, "materials");
  }
  return { materials, text: rest.join(" ") };
}

export function readStats(doc: MarkupDocument, prefix: StatsPrefix, field: string): StatsLine {
  const lines = doc.descriptionLines.map(parseStatsLine).filter((stats): stats is StatsLine => stats !== null);
  if (lines.length === 0) {
    throw new ExtractionError(doc.url, "stats");
  }
  const stats = lines.find((candidate) => candidate.prefix === prefix);
  if (!stats) {
    throw new ExtractionError(doc.url, field);
  }
  return stats;
}

export function requireDefense(doc: MarkupDocument, stats: StatsLine): StatValue {
  if (stats.defense === null) {
    throw new ExtractionError(doc.url, "defense");
  }
  return stats.defense;
}

export function readLinkArrows(doc: MarkupDocument): string[] {
  for (const line of doc.headerLines) {
    const match = LINK_ARROWS_PATTERN.exec(line);
    if (!match) continue;
    const arrows = match[1]
      .split(/[/／]/)
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    if (arrows.length > 0) return arrows;
  }
  throw new ExtractionError(doc.url, "linkDirection");
}
