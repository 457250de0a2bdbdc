import path from "path";
import { SerializationError, errorMessage } from "../errors";
import { CardRecord, MATERIAL_HOOK, StatValue } from "../types/card";
import { writeText } from "../utils/fs";

type FieldValue =
  | { format: "string"; value: string }
  | { format: "const"; value: string }
  | { format: "stat"; value: StatValue }
  | { format: "flag"; value: boolean }
  | { format: "list"; value: readonly string[] }
  | { format: "code"; value: string };

type Field = readonly [key: string, value: FieldValue];

const str = (value: string): FieldValue => ({ format: "string", value });
const constant = (value: string): FieldValue => ({ format: "const", value });
const stat = (value: StatValue): FieldValue => ({ format: "stat", value });
const flag = (value: boolean): FieldValue => ({ format: "flag", value });
const list = (value: readonly string[]): FieldValue => ({ format: "list", value });
const code = (value: string): FieldValue => ({ format: "code", value });

interface SummonFlags {
  hasDefense: boolean;
  hasLevel: boolean;
  hasRank: boolean;
  hasLink: boolean;
  canNormalSummon: boolean;
}

function flagFields(flags: SummonFlags): Field[] {
  return [
    ["hasDefense", flag(flags.hasDefense)],
    ["hasLevel", flag(flags.hasLevel)],
    ["hasRank", flag(flags.hasRank)],
    ["hasLink", flag(flags.hasLink)],
    ["canNormalSummon", flag(flags.canNormalSummon)]
  ];
}

function headFields(record: CardRecord): Field[] {
  return [
    ["card_name", str(record.card_name)],
    ["card_type", constant(record.card_type)],
    ["text", str(record.text)],
    ["image", str(record.image)]
  ];
}

function materialFields(materials: string): Field[] {
  return [
    ["materials", str(materials)],
    ["filterAvailableMaterials", code(MATERIAL_HOOK)],
    ["materialCondition", code(MATERIAL_HOOK)]
  ];
}

/** Ordered fields for each card kind; the order is the module's schema. */
export function recordFields(record: CardRecord): Field[] {
  const head = headFields(record);
  switch (record.kind) {
    case "trap":
      return [...head, ["trap_type", constant(record.trap_type)]];
    case "spell":
      return [...head, ["magic_type", constant(record.magic_type)]];
    case "monster":
      return [
        ...head,
        ["monster_type", constant(record.monster_type)],
        ["level", stat(record.level)],
        ["element", constant(record.element)],
        ["race", constant(record.race)],
        ["attack", stat(record.attack)],
        ["defense", stat(record.defense)],
        ...flagFields({
          hasDefense: true,
          hasLevel: true,
          hasRank: false,
          hasLink: false,
          canNormalSummon: record.monster_type === "通常モンスター"
        })
      ];
    case "xyz":
      return [
        ...head,
        ["monster_type", constant(record.monster_type)],
        ["rank", stat(record.rank)],
        ["element", constant(record.element)],
        ["race", constant(record.race)],
        ["attack", stat(record.attack)],
        ["defense", stat(record.defense)],
        ...flagFields({ hasDefense: true, hasLevel: false, hasRank: true, hasLink: false, canNormalSummon: false }),
        ...materialFields(record.materials)
      ];
    case "fusion":
    case "synchro":
      return [
        ...head,
        ["monster_type", constant(record.monster_type)],
        ["level", stat(record.level)],
        ["element", constant(record.element)],
        ["race", constant(record.race)],
        ["attack", stat(record.attack)],
        ["defense", stat(record.defense)],
        ...flagFields({ hasDefense: true, hasLevel: true, hasRank: false, hasLink: false, canNormalSummon: false }),
        ...materialFields(record.materials)
      ];
    case "link":
      return [
        ...head,
        ["monster_type", constant(record.monster_type)],
        ["link", stat(record.link)],
        ["linkDirection", list(record.linkDirection)],
        ["element", constant(record.element)],
        ["race", constant(record.race)],
        ["attack", stat(record.attack)],
        ["defense", str(record.defense)],
        ...flagFields({ hasDefense: false, hasLevel: false, hasRank: false, hasLink: true, canNormalSummon: false }),
        ...materialFields(record.materials)
      ];
  }
}

function renderValue(value: FieldValue): string {
  switch (value.format) {
    case "string":
      return JSON.stringify(value.value);
    case "const":
      return `${JSON.stringify(value.value)} as const`;
    case "stat":
      return typeof value.value === "number" ? String(value.value) : JSON.stringify(value.value.placeholder);
    case "flag":
      return `${value.value} as const`;
    case "list":
      return `[${value.value.map((item) => JSON.stringify(item)).join(", ")}] as const`;
    case "code":
      return value.value;
  }
}

export function serializeRecord(record: CardRecord): string {
  const lines = ["export default {"];
  for (const [key, value] of recordFields(record)) {
    lines.push(`    ${key}: ${renderValue(value)},`);
  }
  lines.push("};");
  return lines.join("\n") + "\n";
}

function cardIdFromUrl(sourceUrl: string): string | null {
  try {
    const id = new URL(sourceUrl).searchParams.get("id");
    return id && /^\d+$/.test(id) ? id : null;
  } catch {
    return null;
  }
}

export function safeCardName(name: string): string {
  return name
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .trim()
    .replace(/[-\s]+/g, "_");
}

/** `<id>.ts` from the page's numeric id parameter, else the sanitized card name. */
export function recordFileName(record: CardRecord, sourceUrl: string): string {
  const id = cardIdFromUrl(sourceUrl);
  if (id) return `${id}.ts`;
  const name = safeCardName(record.card_name);
  if (!name) {
    throw new SerializationError(sourceUrl, `Cannot derive an output file name for ${sourceUrl}`);
  }
  return `${name}.ts`;
}

export async function writeRecord(record: CardRecord, sourceUrl: string, outputDir: string): Promise<string> {
  const filePath = path.join(outputDir, recordFileName(record, sourceUrl));
  try {
    await writeText(filePath, serializeRecord(record));
  } catch (error) {
    throw new SerializationError(sourceUrl, `Failed to write ${filePath}: ${errorMessage(error)}`, error);
  }
  return filePath;
}
