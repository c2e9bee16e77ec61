import * as fs from "node:fs";
import * as path from "node:path";
import * as XLSX from "xlsx";
import type { Cell, Dataset, RawRow } from "./types.js";
import { DataError } from "./errors.js";

export interface ReadOptions {
  /** Sheet to read. Defaults to the first one. */
  sheet?: string;
}

const TEXT_EXTENSIONS = new Set([".csv", ".txt", ".tsv"]);

/**
 * Read a workbook or delimited text export into a Dataset. The first
 * non-blank row is the header. Text formats are read without value
 * coercion, so "1,500$" arrives as written.
 */
export function readDataset(data: Buffer | string, options: ReadOptions = {}): Dataset {
  const workbook =
    typeof data === "string"
      ? XLSX.read(data, { type: "string", raw: true })
      : XLSX.read(data, { type: "buffer", raw: true });

  const sheetName = options.sheet ?? workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new DataError(
      options.sheet ? `Sheet "${options.sheet}" not found` : "Workbook has no sheets"
    );
  }

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
  if (grid.length === 0) {
    throw new DataError("Sheet has no header row");
  }

  const columns = headerNames(grid[0]);
  const rows: RawRow[] = grid.slice(1).map((values) => {
    const row: Record<string, Cell> = {};
    columns.forEach((col, i) => {
      row[col] = toCell(values[i]);
    });
    return row;
  });

  return { columns, rows };
}

export function loadDataset(filePath: string, options: ReadOptions = {}): Dataset {
  const ext = path.extname(filePath).toLowerCase();
  const content = TEXT_EXTENSIONS.has(ext)
    ? fs.readFileSync(filePath, "utf-8")
    : fs.readFileSync(filePath);
  return readDataset(content, options);
}

// Blank headers become "column_<n>"; repeats get ".1", ".2" suffixes.
function headerNames(values: unknown[]): string[] {
  const seen = new Map<string, number>();
  return values.map((value, i) => {
    const base = toCell(value)?.toString().trim() || `column_${i + 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return value;
  if (typeof value === "string") return value === "" ? null : value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
