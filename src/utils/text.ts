export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function isBracketed(line: string): boolean {
  return line.includes("【") && line.includes("】");
}
