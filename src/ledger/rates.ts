import type { CalculationMethod, RateEntry, RateTable } from "./types.js";
import { VALID_METHODS } from "./types.js";
import type { ValidationError } from "./errors.js";
import { normalizeKey } from "./helpers.js";

export interface ConfigLineError extends ValidationError {
  /** 1-based line number in the submitted text. */
  line: number;
  text: string;
}

export interface ParsedConfig {
  table: RateTable;
  errors: ConfigLineError[];
}

export function emptyRateTable(method: CalculationMethod): RateTable {
  return { method, entries: new Map() };
}

/** Build a table from a name → rate record. Use checkRateTable() to validate it. */
export function createRateTable(
  method: CalculationMethod,
  rates: Readonly<Record<string, number>>
): RateTable {
  const entries = new Map<string, RateEntry>();
  for (const [entity, rate] of Object.entries(rates)) {
    entries.set(normalizeKey(entity), { entity: entity.trim(), rate });
  }
  return { method, entries };
}

export function rateTableToRecord(table: RateTable): Record<string, number> {
  const record: Record<string, number> = {};
  for (const { entity, rate } of table.entries.values()) {
    record[entity] = rate;
  }
  return record;
}

export function lookupRate(table: RateTable, entityKey: string): RateEntry | undefined {
  return table.entries.get(entityKey);
}

function maxRate(method: CalculationMethod): number {
  return method === "percentage" ? 100 : Infinity;
}

/**
 * Parse "entity: value" lines into a rate table.
 *
 * Each line stands alone: a bad line is reported and skipped, the rest still
 * count. Values may carry "%", "$" and thousands commas. Blank lines are
 * ignored; a later line for the same entity replaces an earlier one.
 */
export function validateConfig(
  text: string,
  method: CalculationMethod = "percentage"
): ParsedConfig {
  const entries = new Map<string, RateEntry>();
  const errors: ConfigLineError[] = [];
  const limit = maxRate(method);

  const lines = text.split(/\r?\n/);
  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;
    const fail = (rule: string, message: string) =>
      errors.push({ rule, message, line: i + 1, text: line, path: `line ${i + 1}` });

    const sep = line.indexOf(":");
    if (sep < 0) {
      fail("missing-separator", `Line ${i + 1}: expected "name: value", got "${line}"`);
      return;
    }

    const entity = line.slice(0, sep).trim();
    const valueText = line.slice(sep + 1).replace(/[%$,]/g, "").trim();
    if (!entity) {
      fail("empty-entity", `Line ${i + 1}: missing name before ":"`);
      return;
    }

    const rate = /^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(valueText) ? Number(valueText) : NaN;
    if (!Number.isFinite(rate)) {
      fail("non-numeric-rate", `Line ${i + 1}: "${line.slice(sep + 1).trim()}" is not a number for "${entity}"`);
      return;
    }
    if (rate < 0 || rate > limit) {
      fail(
        "rate-out-of-range",
        `Line ${i + 1}: rate ${rate} for "${entity}" must be ${method === "percentage" ? "between 0 and 100" : "0 or more"}`
      );
      return;
    }

    entries.set(normalizeKey(entity), { entity, rate });
  });

  return { table: { method, entries }, errors };
}

/** Structural checks run before a table is persisted. */
export function checkRateTable(table: RateTable): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!VALID_METHODS.has(table.method)) {
    errors.push({
      rule: "calculation-method",
      message: `Unknown calculation method "${table.method}"`,
      path: "method",
    });
    return errors;
  }

  if (table.entries.size === 0 && table.method !== "sum_only") {
    errors.push({
      rule: "empty-table",
      message: "Rate table has no entries",
      path: "rates",
    });
  }

  const limit = maxRate(table.method);
  for (const [key, { entity, rate }] of table.entries) {
    if (!key || !entity.trim()) {
      errors.push({
        rule: "empty-entity",
        message: "Rate table contains an entry with an empty name",
        path: "rates",
      });
      continue;
    }
    if (key !== normalizeKey(entity)) {
      errors.push({
        rule: "entity-key",
        message: `Entry "${entity}" is stored under mismatched key "${key}"`,
        path: `rates.${entity}`,
      });
    }
    if (typeof rate !== "number" || !Number.isFinite(rate)) {
      errors.push({
        rule: "invalid-rate",
        message: `Rate for "${entity}" is not a finite number: ${rate}`,
        path: `rates.${entity}`,
      });
    } else if (rate < 0 || rate > limit) {
      errors.push({
        rule: "rate-out-of-range",
        message: `Rate ${rate} for "${entity}" must be ${table.method === "percentage" ? "between 0 and 100" : "0 or more"}`,
        path: `rates.${entity}`,
      });
    }
  }

  return errors;
}
