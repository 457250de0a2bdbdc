import { collectMarkers } from "../classify/cardType";
import { MarkupDocument } from "../dom/markupDocument";
import { ExtractionError } from "../errors";
import {
  SPELL_SUBTYPES,
  SpellRecord,
  SpellSubtype,
  TRAP_SUBTYPES,
  TrapRecord,
  TrapSubtype
} from "../types/card";
import { readBaseFields, readCardText } from "./common";

function findSubtype<T extends string>(doc: MarkupDocument, subtypes: readonly T[], field: string): T {
  const markers: ReadonlySet<string> = collectMarkers(doc);
  const subtype = subtypes.find((candidate) => markers.has(candidate));
  if (!subtype) {
    throw new ExtractionError(doc.url, field);
  }
  return subtype;
}

export function extractTrap(doc: MarkupDocument): TrapRecord {
  const base = readBaseFields(doc);
  const trapType: TrapSubtype = findSubtype(doc, TRAP_SUBTYPES, "trap_type");
  return {
    kind: "trap",
    card_name: base.card_name,
    card_type: "罠",
    text: readCardText(doc),
    image: base.image,
    trap_type: trapType
  };
}

export function extractSpell(doc: MarkupDocument): SpellRecord {
  const base = readBaseFields(doc);
  const magicType: SpellSubtype = findSubtype(doc, SPELL_SUBTYPES, "magic_type");
  return {
    kind: "spell",
    card_name: base.card_name,
    card_type: "魔法",
    text: readCardText(doc),
    image: base.image,
    magic_type: magicType
  };
}
