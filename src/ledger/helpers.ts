import type { Cell } from "./types.js";

/** Entity key used for rate lookups and grouping: trimmed, single-spaced, lower-case. */
export function normalizeKey(text: string): string {
  return text.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Trimmed text of a cell; null and undefined read as "". */
export function cellText(cell: Cell | undefined): string {
  if (cell === null || cell === undefined) return "";
  return String(cell).trim();
}

export function isBlank(cell: Cell | undefined): boolean {
  return cellText(cell) === "";
}
