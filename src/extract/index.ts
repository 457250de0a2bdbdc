import { MarkupDocument } from "../dom/markupDocument";
import { CardRecord, CardRecordOf, CardType } from "../types/card";
import { extractFusion, extractLink, extractMonster, extractSynchro, extractXyz } from "./monsters";
import { extractSpell, extractTrap } from "./spellTrap";

export type FieldExtractor<T extends CardType> = (doc: MarkupDocument) => CardRecordOf<T>;

export const FIELD_EXTRACTORS: { [T in CardType]: FieldExtractor<T> } = {
  trap: extractTrap,
  spell: extractSpell,
  monster: extractMonster,
  xyz: extractXyz,
  fusion: extractFusion,
  synchro: extractSynchro,
  link: extractLink
};

export function extractCard(type: CardType, doc: MarkupDocument): CardRecord {
  const extractor = FIELD_EXTRACTORS[type];
  return extractor(doc);
}
