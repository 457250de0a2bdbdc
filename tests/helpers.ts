import { readFileSync } from "fs";
import path from "path";
import { MarkupDocument, parseMarkup } from "../src/dom/markupDocument";
import { CardType } from "../src/types/card";

export const fixturesDir = path.join(process.cwd(), "fixtures");

export const CARD_IDS: Record<CardType | "unknown", number> = {
  trap: 10001,
  spell: 10002,
  monster: 10003,
  xyz: 10004,
  fusion: 10005,
  synchro: 10006,
  link: 10007,
  unknown: 10008
};

export function pageUrl(id: number): string {
  return `https://shop.example.com/?act=sell_detail&id=${id}`;
}

export function readPage(name: string): string {
  return readFileSync(path.join(fixturesDir, "pages", `${name}.html`), "utf8");
}

export function loadPage(name: CardType | "unknown"): MarkupDocument {
  return parseMarkup(readPage(name), pageUrl(CARD_IDS[name]));
}

export function readExpected(id: number): string {
  return readFileSync(path.join(fixturesDir, "expected", `${id}.expected.txt`), "utf8");
}

/** Minimal detail page for one-off markup shapes. */
export function detailPage(options: { name?: string; imageSrc?: string; lines: string[] }): string {
  const image = options.imageSrc === undefined ? "" : `<img id="detail_def_img" src="${options.imageSrc}" alt="${options.name ?? ""}">`;
  return `<html><body>${image}<div class="cardDescription"><p>${options.lines.join("<br>")}</p></div></body></html>`;
}
