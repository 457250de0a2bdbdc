import { collectMarkers } from "../classify/cardType";
import { MarkupDocument } from "../dom/markupDocument";
import {
  FusionRecord,
  LinkRecord,
  MonsterRecord,
  SynchroRecord,
  XyzRecord
} from "../types/card";
import {
  readBaseFields,
  readCardText,
  readLinkArrows,
  readMaterialsAndText,
  readStats,
  requireDefense
} from "./common";

export function extractMonster(doc: MarkupDocument): MonsterRecord {
  const base = readBaseFields(doc);
  const stats = readStats(doc, "星", "level");
  return {
    kind: "monster",
    card_name: base.card_name,
    card_type: "モンスター",
    text: readCardText(doc),
    image: base.image,
    monster_type: collectMarkers(doc).has("通常モンスター") ? "通常モンスター" : "効果モンスター",
    level: stats.value,
    element: stats.element,
    race: stats.race,
    attack: stats.attack,
    defense: requireDefense(doc, stats)
  };
}

export function extractXyz(doc: MarkupDocument): XyzRecord {
  const base = readBaseFields(doc);
  const stats = readStats(doc, "ランク", "rank");
  const { materials, text } = readMaterialsAndText(doc);
  return {
    kind: "xyz",
    card_name: base.card_name,
    card_type: "モンスター",
    text,
    image: base.image,
    monster_type: "エクシーズモンスター",
    rank: stats.value,
    element: stats.element,
    race: stats.race,
    attack: stats.attack,
    defense: requireDefense(doc, stats),
    materials
  };
}

export function extractFusion(doc: MarkupDocument): FusionRecord {
  const base = readBaseFields(doc);
  const stats = readStats(doc, "星", "level");
  const { materials, text } = readMaterialsAndText(doc);
  return {
    kind: "fusion",
    card_name: base.card_name,
    card_type: "モンスター",
    text,
    image: base.image,
    monster_type: "融合モンスター",
    level: stats.value,
    element: stats.element,
    race: stats.race,
    attack: stats.attack,
    defense: requireDefense(doc, stats),
    materials
  };
}

export function extractSynchro(doc: MarkupDocument): SynchroRecord {
  const base = readBaseFields(doc);
  const stats = readStats(doc, "星", "level");
  const { materials, text } = readMaterialsAndText(doc);
  return {
    kind: "synchro",
    card_name: base.card_name,
    card_type: "モンスター",
    text,
    image: base.image,
    monster_type: "シンクロモンスター",
    level: stats.value,
    element: stats.element,
    race: stats.race,
    attack: stats.attack,
    defense: requireDefense(doc, stats),
    materials
  };
}

// Link monsters have no DEF; the record keeps the field as a blank string.
export function extractLink(doc: MarkupDocument): LinkRecord {
  const base = readBaseFields(doc);
  const stats = readStats(doc, "LINK-", "link");
  const { materials, text } = readMaterialsAndText(doc);
  return {
    kind: "link",
    card_name: base.card_name,
    card_type: "モンスター",
    text,
    image: base.image,
    monster_type: "リンクモンスター",
    link: stats.value,
    linkDirection: readLinkArrows(doc),
    element: stats.element,
    race: stats.race,
    attack: stats.attack,
    defense: "",
    materials
  };
}
