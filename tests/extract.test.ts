import { describe, expect, it } from "vitest";
import { parseMarkup } from "../src/dom/markupDocument";
import { ExtractionError } from "../src/errors";
import { extractCard } from "../src/extract";
import { parseStat, parseStatsLine } from "../src/extract/common";
import { extractLink, extractMonster, extractXyz } from "../src/extract/monsters";
import { extractTrap } from "../src/extract/spellTrap";
import { detailPage, loadPage, readPage } from "./helpers";

const URL = "https://shop.example.com/?act=sell_detail&id=20000";

function missingField(run: () => unknown): string | null {
  try {
    run();
  } catch (error) {
    if (error instanceof ExtractionError) return error.field;
    throw error;
  }
  return null;
}

describe("stat parsing", () => {
  it("parses integers and keeps placeholders verbatim", () => {
    expect(parseStat("2500")).toBe(2500);
    expect(parseStat("?")).toEqual({ placeholder: "?" });
    expect(parseStat("X000")).toEqual({ placeholder: "X000" });
  });

  it("reads level, rank and link stat lines", () => {
    expect(parseStatsLine("星4 / 闇 / 魔法使い族 / 攻1800 / 守1000")).toEqual({
      prefix: "星",
      value: 4,
      element: "闇",
      race: "魔法使い族",
      attack: 1800,
      defense: 1000
    });
    expect(parseStatsLine("ランク4 / 光 / 戦士族 / 攻? / 守2000")?.attack).toEqual({ placeholder: "?" });
    expect(parseStatsLine("LINK-3 / 地 / 機械族 / 攻2300")).toEqual({
      prefix: "LINK-",
      value: 3,
      element: "地",
      race: "機械族",
      attack: 2300,
      defense: null
    });
    expect(parseStatsLine("このカードは戦士族として扱う。")).toBeNull();
  });
});

describe("field extraction", () => {
  it("extracts a trap card", () => {
    expect(extractTrap(loadPage("trap"))).toEqual({
      kind: "trap",
      card_name: "霧の罠",
      card_type: "罠",
      text: "相手モンスターの攻撃宣言時に発動できる。 その攻撃を無効にする。",
      image: "10001.jpg",
      trap_type: "通常罠"
    });
  });

  it("skips restriction tags in spell text", () => {
    const record = extractCard("spell", loadPage("spell"));

    expect(record).toMatchObject({
      kind: "spell",
      magic_type: "速攻魔法",
      text: "フィールドのカード1枚を対象として発動できる。 そのカードを持ち主の手札に戻す。"
    });
  });

  it("falls back to the image alt text for the name", () => {
    const record = extractMonster(loadPage("monster"));

    expect(record.card_name).toBe("影の魔導士");
    expect(record.monster_type).toBe("効果モンスター");
    expect(record.level).toBe(4);
    expect(record.defense).toBe(1000);
  });

  it("marks normal monsters", () => {
    const doc = parseMarkup(
      detailPage({
        name: "岩の巨兵",
        imageSrc: "/img/card/3.jpg",
        lines: ["【通常モンスター】", "星4 / 地 / 岩石族 / 攻1300 / 守2000", "岩山に住む巨人。"]
      }),
      URL
    );

    expect(extractMonster(doc).monster_type).toBe("通常モンスター");
  });

  it("splits Xyz materials from the effect text", () => {
    const record = extractXyz(loadPage("xyz"));

    expect(record.rank).toBe(4);
    expect(record.materials).toBe("レベル4モンスター×2");
    expect(record.text).toBe("このカードのX素材を1つ取り除いて発動できる。 相手フィールドのカード1枚を破壊する。");
  });

  it("keeps placeholder stats on fusion and synchro monsters", () => {
    expect(extractCard("fusion", loadPage("fusion"))).toMatchObject({ attack: 2800, defense: { placeholder: "?" } });
    expect(extractCard("synchro", loadPage("synchro"))).toMatchObject({ attack: { placeholder: "?" }, defense: 2100 });
  });

  it("extracts link rating, arrows and a blank DEF", () => {
    const record = extractLink(loadPage("link"));

    expect(record.link).toBe(2);
    expect(record.linkDirection).toEqual(["左下", "右下"]);
    expect(record.attack).toBe(1500);
    expect(record.defense).toBe("");
    expect(record.materials).toBe("効果モンスター2体");
  });

  it("reports the missing materials line", () => {
    const doc = parseMarkup(readPage("xyz-missing-materials"), URL);

    expect(missingField(() => extractXyz(doc))).toBe("materials");
  });

  it("reports a rank page read as a level monster", () => {
    expect(missingField(() => extractMonster(loadPage("xyz")))).toBe("level");
  });

  it("reports a missing stats line", () => {
    const doc = parseMarkup(
      detailPage({ name: "名無し", imageSrc: "/a.jpg", lines: ["【効果モンスター】", "効果テキスト。"] }),
      URL
    );

    expect(missingField(() => extractMonster(doc))).toBe("stats");
  });

  it("reports a missing DEF on a level monster", () => {
    const doc = parseMarkup(
      detailPage({ name: "名無し", imageSrc: "/a.jpg", lines: ["【効果モンスター】", "星3 / 水 / 水族 / 攻1000", "効果テキスト。"] }),
      URL
    );

    expect(missingField(() => extractMonster(doc))).toBe("defense");
  });

  it("reports missing link arrows", () => {
    const doc = parseMarkup(
      detailPage({
        name: "名無し",
        imageSrc: "/a.jpg",
        lines: ["【リンクモンスター/効果】", "LINK-1 / 光 / 天使族 / 攻800", "トークン以外のモンスター1体"]
      }),
      URL
    );

    expect(missingField(() => extractLink(doc))).toBe("linkDirection");
  });

  it("reports a missing name and image", () => {
    const noName = parseMarkup(detailPage({ imageSrc: "/a.jpg", lines: ["【通常罠】", "効果。"] }), URL);
    const noImage = parseMarkup(
      [
        '<html><head><script type="application/ld+json">{"name":"霧の罠"}</script></head>',
        '<body><div class="cardDescription"><p>【通常罠】<br>効果。</p></div></body></html>'
      ].join(""),
      URL
    );

    expect(missingField(() => extractTrap(noName))).toBe("card_name");
    expect(missingField(() => extractTrap(noImage))).toBe("image");
  });

  it("names the URL in the error message", () => {
    const doc = parseMarkup(detailPage({ name: "霧の罠", imageSrc: "/a.jpg", lines: ["【通常罠】"] }), URL);

    expect(() => extractTrap(doc)).toThrow(`Missing field "text" in ${URL}`);
  });
});
