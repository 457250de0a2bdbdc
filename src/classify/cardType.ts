import { MarkupDocument } from "../dom/markupDocument";
import { CardType, ClassificationResult, SPELL_SUBTYPES, TRAP_SUBTYPES } from "../types/card";

export const MONSTER_MARKERS = [
  "リンクモンスター",
  "エクシーズモンスター",
  "Ｘモンスター",
  "シンクロモンスター",
  "融合モンスター",
  "通常モンスター",
  "効果モンスター"
] as const;

export const KNOWN_MARKERS = [...TRAP_SUBTYPES, ...SPELL_SUBTYPES, ...MONSTER_MARKERS] as const;

export type Marker = (typeof KNOWN_MARKERS)[number];
export type MarkerSet = ReadonlySet<Marker>;

interface TypeRule {
  type: CardType;
  matches: (markers: MarkerSet) => boolean;
}

const hasAny =
  (...candidates: readonly Marker[]) =>
  (markers: MarkerSet): boolean =>
    candidates.some((marker) => markers.has(marker));

// Spell/trap before monsters, extra-deck monsters before the generic monster rule.
export const TYPE_RULES: readonly TypeRule[] = [
  { type: "trap", matches: hasAny(...TRAP_SUBTYPES) },
  { type: "spell", matches: hasAny(...SPELL_SUBTYPES) },
  { type: "link", matches: hasAny("リンクモンスター") },
  { type: "xyz", matches: hasAny("エクシーズモンスター", "Ｘモンスター") },
  { type: "synchro", matches: hasAny("シンクロモンスター") },
  { type: "fusion", matches: hasAny("融合モンスター") },
  { type: "monster", matches: hasAny("通常モンスター", "効果モンスター") }
];

/** Category keywords found in the page's 【…】 header lines. Card text is not inspected. */
export function collectMarkers(doc: MarkupDocument): MarkerSet {
  const header = doc.headerLines.join("\n");
  return new Set(KNOWN_MARKERS.filter((marker) => header.includes(marker)));
}

export function matchingTypes(markers: MarkerSet): CardType[] {
  return TYPE_RULES.filter((rule) => rule.matches(markers)).map((rule) => rule.type);
}

export function classifyMarkers(markers: MarkerSet, url: string): ClassificationResult {
  const rule = TYPE_RULES.find((candidate) => candidate.matches(markers));
  return rule ? { ok: true, type: rule.type } : { ok: false, url };
}

export function classify(doc: MarkupDocument): ClassificationResult {
  return classifyMarkers(collectMarkers(doc), doc.url);
}
