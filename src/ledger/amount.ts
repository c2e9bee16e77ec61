import type { Cell } from "./types.js";

// Thousands groups use commas or single spaces, never both.
const NUMERIC_CORE = /^(?:(?:\d{1,3}(?:,\d{3})+|\d{1,3}(?: \d{3})+|\d+)(?:\.\d+)?|\.\d+)$/;

// A sign or parenthesis counts only when it touches the number, at most with
// a currency symbol in between: "-$50", "$(300)", "(1,200)".
const SIGN_BEFORE = /([-(])(?:\p{Sc}\s*)?$/u;
const PAREN_AFTER = /^(?:\s*\p{Sc})?\)/u;

/**
 * Convert a revenue cell to a number, or null when it cannot be read.
 *
 * The digits must form one number (thousands groups, one decimal point).
 * Whatever sits before the first digit or after the last one is decoration:
 * currency symbols, codes, trailing notes such as "1752$+LUMPE". A minus or
 * parentheses directly around the number make it negative.
 *
 *   "$1,500$" → 1500     "(1,200.50)" → -1200.5     "1,50" → null
 */
export function normalizeAmount(cell: Cell | undefined): number | null {
  if (cell === null || cell === undefined) return null;
  if (typeof cell === "number") {
    return Number.isFinite(cell) ? cell : null;
  }

  const text = cell.trim();
  const first = text.search(/\d/);
  if (first < 0) return null;
  let last = first;
  for (let i = text.length - 1; i > first; i--) {
    if (text[i] >= "0" && text[i] <= "9") {
      last = i;
      break;
    }
  }

  // A leading "." is part of the number ("$.50"), not decoration.
  const start = first > 0 && text[first - 1] === "." ? first - 1 : first;
  const prefix = text.slice(0, start);
  const suffix = text.slice(last + 1);
  const core = text.slice(start, last + 1);

  if (!NUMERIC_CORE.test(core)) return null;

  const sign = SIGN_BEFORE.exec(prefix)?.[1];
  const opensParen = sign === "(";
  const closesParen = PAREN_AFTER.test(suffix);
  if (opensParen !== closesParen) return null;

  const negative = sign !== undefined;
  const value = Number(core.replace(/[ ,]/g, ""));
  if (!Number.isFinite(value)) return null;
  return negative ? -value : value;
}
