export const CARD_TYPES = ["trap", "spell", "monster", "xyz", "fusion", "synchro", "link"] as const;

export type CardType = (typeof CARD_TYPES)[number];

/** A non-numeric stat printed on the page (usually "?"), kept verbatim. */
export interface Placeholder {
  placeholder: string;
}

export type StatValue = number | Placeholder;

export interface ImageReference {
  filename: string;
}

export type ClassificationResult = { ok: true; type: CardType } | { ok: false; url: string };

export const TRAP_SUBTYPES = ["通常罠", "永続罠", "カウンター罠"] as const;
export const SPELL_SUBTYPES = [
  "通常魔法",
  "永続魔法",
  "速攻魔法",
  "装備魔法",
  "フィールド魔法",
  "儀式魔法"
] as const;

export type TrapSubtype = (typeof TRAP_SUBTYPES)[number];
export type SpellSubtype = (typeof SPELL_SUBTYPES)[number];
export type MainDeckMonsterType = "通常モンスター" | "効果モンスター";

/** Literal emitted for the material hooks; the game engine fills these in by hand. */
export const MATERIAL_HOOK = "() => true";

interface CardBase {
  card_name: string;
  text: string;
  image: string;
}

export interface TrapRecord extends CardBase {
  kind: "trap";
  card_type: "罠";
  trap_type: TrapSubtype;
}

export interface SpellRecord extends CardBase {
  kind: "spell";
  card_type: "魔法";
  magic_type: SpellSubtype;
}

interface MonsterBase extends CardBase {
  card_type: "モンスター";
  element: string;
  race: string;
  attack: StatValue;
}

export interface MonsterRecord extends MonsterBase {
  kind: "monster";
  monster_type: MainDeckMonsterType;
  level: StatValue;
  defense: StatValue;
}

interface ExtraDeckBase extends MonsterBase {
  materials: string;
}

export interface XyzRecord extends ExtraDeckBase {
  kind: "xyz";
  monster_type: "エクシーズモンスター";
  rank: StatValue;
  defense: StatValue;
}

export interface FusionRecord extends ExtraDeckBase {
  kind: "fusion";
  monster_type: "融合モンスター";
  level: StatValue;
  defense: StatValue;
}

export interface SynchroRecord extends ExtraDeckBase {
  kind: "synchro";
  monster_type: "シンクロモンスター";
  level: StatValue;
  defense: StatValue;
}

export interface LinkRecord extends ExtraDeckBase {
  kind: "link";
  monster_type: "リンクモンスター";
  link: StatValue;
  linkDirection: string[];
  defense: "";
}

export type CardRecord =
  | TrapRecord
  | SpellRecord
  | MonsterRecord
  | XyzRecord
  | FusionRecord
  | SynchroRecord
  | LinkRecord;

export type CardRecordOf<T extends CardType> = Extract<CardRecord, { kind: T }>;
