import type { PeriodAssignment, PeriodLabel, RawRow } from "./types.js";
import { UNASSIGNED_PERIOD } from "./types.js";
import { cellText, isBlank } from "./helpers.js";

export const DEFAULT_MARKER_PATTERN = /\b(week)\s*#?\s*(\d+)/i;

export interface SegmentOptions {
  /** Column whose text may announce a new period. */
  markerColumn: string;
  /** Money columns; a marker row has all of these empty. */
  amountColumns: readonly string[];
  /**
   * Marker pattern. With two capture groups the first is the keyword used
   * in the label and the second the ordinal; with one, it is the ordinal.
   * Defaults to "Week <n>".
   */
  pattern?: RegExp;
}

/**
 * Assign a period to every row. Returns one entry per input row, in input
 * order, so callers merge by index.
 *
 * A marker row is structural: its marker cell matches the pattern AND all of
 * its money cells are empty. A data row that merely mentions "week 3" in a
 * note keeps the current period. Labels are forward-filled until the next
 * marker; rows before the first marker are UNASSIGNED_PERIOD.
 */
export function segmentPeriods(
  rows: readonly RawRow[],
  options: SegmentOptions
): PeriodAssignment[] {
  const pattern = withoutStatefulFlags(options.pattern ?? DEFAULT_MARKER_PATTERN);
  const assignments: PeriodAssignment[] = [];
  let current: PeriodLabel = UNASSIGNED_PERIOD;

  for (const row of rows) {
    const found = matchMarker(row, options, pattern);
    if (found) current = found;
    assignments.push({ period: current, marker: found !== null });
  }

  return assignments;
}

// "g" and "y" make exec() resume from lastIndex, which would carry over
// from one row to the next.
function withoutStatefulFlags(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace(/[gy]/g, "");
  return flags === pattern.flags ? pattern : new RegExp(pattern.source, flags);
}

function matchMarker(
  row: RawRow,
  options: SegmentOptions,
  pattern: RegExp
): PeriodLabel | null {
  const text = cellText(row[options.markerColumn]);
  if (!text) return null;

  const match = pattern.exec(text);
  if (!match) return null;

  if (!options.amountColumns.every((col) => isBlank(row[col]))) return null;

  const [keyword, digits] =
    match.length > 2 ? [match[1] ?? "", match[2]] : ["", match[1]];
  const ordinal = Number(digits);
  if (!Number.isInteger(ordinal)) return null;

  const label = keyword
    ? `${keyword.charAt(0).toUpperCase()}${keyword.slice(1).toLowerCase()} ${ordinal}`
    : String(ordinal);
  return { ordinal, label };
}

/** Unassigned first, then ascending ordinal. */
export function comparePeriods(a: PeriodLabel, b: PeriodLabel): number {
  if (a.ordinal === null) return b.ordinal === null ? 0 : -1;
  if (b.ordinal === null) return 1;
  return a.ordinal - b.ordinal;
}
