import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseMarkup } from "../src/dom/markupDocument";
import { extractCard } from "../src/extract";
import { recordFileName, safeCardName, serializeRecord, writeRecord } from "../src/serialize/recordSerializer";
import { CARD_TYPES, TrapRecord } from "../src/types/card";
import { CARD_IDS, detailPage, loadPage, pageUrl, readExpected } from "./helpers";

const trap: TrapRecord = {
  kind: "trap",
  card_name: "霧の罠",
  card_type: "罠",
  text: "「霧」と書かれた\"カード\"",
  image: "10001.jpg",
  trap_type: "カウンター罠"
};

describe("record serializer", () => {
  it.each(CARD_TYPES)("renders the %s fixture as its expected module", (type) => {
    const record = extractCard(type, loadPage(type));

    expect(serializeRecord(record)).toBe(readExpected(CARD_IDS[type]));
  });

  it("lets only normal monsters be normal summoned", () => {
    const effect = extractCard("monster", loadPage("monster"));
    const normal = extractCard(
      "monster",
      parseMarkup(
        detailPage({
          name: "岩の巨兵",
          imageSrc: "/img/card/3.jpg",
          lines: ["【通常モンスター】", "星4 / 地 / 岩石族 / 攻1300 / 守2000", "岩山に住む巨人。"]
        }),
        pageUrl(3)
      )
    );

    expect(serializeRecord(effect)).toContain("    canNormalSummon: false as const,\n");
    expect(serializeRecord(normal)).toContain("    canNormalSummon: true as const,\n");
  });

  it("escapes quotes in string values", () => {
    expect(serializeRecord(trap)).toContain('    text: "「霧」と書かれた\\"カード\\"",\n');
  });

  it("names files by the numeric id parameter", () => {
    expect(recordFileName(trap, pageUrl(123))).toBe("123.ts");
  });

  it("falls back to the sanitized card name", () => {
    expect(safeCardName("Dark Magician - Girl!")).toBe("Dark_Magician_Girl");
    expect(recordFileName(trap, "https://shop.example.com/card/kiri")).toBe("霧の罠.ts");
    expect(recordFileName({ ...trap, card_name: "Mist Trap" }, "not a url")).toBe("Mist_Trap.ts");
  });

  it("refuses a record with no usable file name", () => {
    expect(() => recordFileName({ ...trap, card_name: "!!" }, "https://shop.example.com/card")).toThrow(
      "Cannot derive an output file name"
    );
  });

  describe("writeRecord", () => {
    let outDir: string;

    beforeEach(async () => {
      outDir = await mkdtemp(path.join(os.tmpdir(), "card-out-"));
    });

    afterEach(async () => {
      await rm(outDir, { recursive: true, force: true });
    });

    it("overwrites the same file on a second write", async () => {
      const first = await writeRecord(trap, pageUrl(10001), outDir);
      const second = await writeRecord(trap, pageUrl(10001), outDir);

      expect(second).toBe(first);
      expect(await readdir(outDir)).toEqual(["10001.ts"]);
      expect(await readFile(first, "utf8")).toBe(serializeRecord(trap));
    });
  });
});
