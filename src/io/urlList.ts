import { readText } from "../utils/fs";

/** One URL per line; surrounding whitespace trimmed, blank lines dropped, order kept. */
export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function readUrlList(filePath: string): Promise<string[]> {
  return parseUrlList(await readText(filePath));
}
