import iconv from "iconv-lite";

export const LISTING_ENCODING = "big5";

export function decodeBig5(buffer: Buffer): string {
  // The listing declares Big5; decode it here and work in UTF-16 strings from then on
  return iconv.decode(buffer, LISTING_ENCODING);
}

export function encodeBig5(text: string): Buffer {
  return iconv.encode(text, LISTING_ENCODING);
}

// Empty cells hold a lone &nbsp;. Only the ends are stripped.
export function stripPlaceholder(text: string): string {
  return text.replace(/^[\s\u00A0]+|[\s\u00A0]+$/g, "");
}

const INT_CELL = /^-?\d+$/;
const FLOAT_CELL = /^-?\d+(\.\d+)?$/;

/** `empty` for a blank cell, null when the text is not an integer. */
export function parseIntCell(text: string, empty: number): number | null {
  const value = stripPlaceholder(text);
  if (value === "") return empty;
  return INT_CELL.test(value) ? parseInt(value, 10) : null;
}

export function parseFloatCell(text: string, empty: number): number | null {
  const value = stripPlaceholder(text);
  if (value === "") return empty;
  return FLOAT_CELL.test(value) ? parseFloat(value) : null;
}

/** Reads one query parameter from an absolute or page-relative link. */
export function queryParam(href: string, key: string): string | null {
  const query = href.includes("?") ? href.slice(href.indexOf("?") + 1) : "";
  return new URLSearchParams(query).get(key);
}

export function formatProgress(now: number, total: number): string {
  const percent = total > 0 ? (now / total) * 100 : 100;
  const hashes = Math.floor(percent / 2);
  const blanks = 50 - hashes;
  const counts = `(${String(now).padStart(5)}/${String(total).padStart(5)})`;
  return `${counts} [${"#".repeat(hashes)}${" ".repeat(blanks)}] ${percent.toFixed(2).padStart(6)}%`;
}
