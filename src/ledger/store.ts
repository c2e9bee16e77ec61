import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import type { RateTable } from "./types.js";
import { ConfigError, type ValidationError } from "./errors.js";
import { checkRateTable, createRateTable, rateTableToRecord } from "./rates.js";
import { resolveStoreOptions, type StoreOptions } from "./config.js";

const StoredRecordSchema = z.object({
  method: z.enum(["percentage", "flat_rate", "sum_only"]),
  rates: z.record(z.string(), z.number()).nullish(),
});

const StoreDocumentSchema = z.record(z.string(), StoredRecordSchema);

const MappingSchema = z.record(z.string(), z.unknown());

/** Top-level key recording that the legacy file has been copied in. */
export const LEGACY_MIGRATED_KEY = "_legacy_migrated";

export interface RateStore {
  tables: Map<string, RateTable>;
  /** Set once the legacy file has been migrated; it is never read again. */
  legacyMigrated: boolean;
}

function shapeErrors(issues: readonly z.ZodIssue[], prefix: readonly (string | number)[] = []): ValidationError[] {
  return issues.map((issue) => {
    const at = [...prefix, ...issue.path].join(".");
    return { rule: "store-shape", message: `${at || "document"}: ${issue.message}`, path: at };
  });
}

/**
 * Parse the store document: category id → { method, rates }, plus the
 * migration flag. An empty document is an empty store. Shape and rate bounds
 * are checked, since the file is meant to be edited by hand.
 */
export function parseStore(yamlString: string): RateStore {
  let raw: unknown;
  try {
    raw = yaml.load(yamlString);
  } catch (err) {
    throw new ConfigError(`Invalid rate store: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (raw === null || raw === undefined) return { tables: new Map(), legacyMigrated: false };

  const shapeMessage = "Invalid rate store: expected a mapping of category id to { method, rates }";
  const document = MappingSchema.safeParse(raw);
  if (!document.success) {
    throw new ConfigError(shapeMessage, shapeErrors(document.error.issues));
  }
  const { [LEGACY_MIGRATED_KEY]: flag, ...records } = document.data;

  const migrated = z.boolean().optional().safeParse(flag);
  if (!migrated.success) {
    throw new ConfigError(shapeMessage, shapeErrors(migrated.error.issues, [LEGACY_MIGRATED_KEY]));
  }
  const parsed = StoreDocumentSchema.safeParse(records);
  if (!parsed.success) {
    throw new ConfigError(shapeMessage, shapeErrors(parsed.error.issues));
  }

  const tables = new Map<string, RateTable>();
  const errors: ValidationError[] = [];
  for (const [id, record] of Object.entries(parsed.data)) {
    const table = createRateTable(record.method, record.rates ?? {});
    for (const e of checkRateTable(table)) {
      if (e.rule === "empty-table") continue;
      errors.push({ ...e, path: `${id}.${e.path ?? ""}` });
    }
    tables.set(id, table);
  }
  if (errors.length > 0) {
    throw new ConfigError("Invalid rate store", errors);
  }
  return { tables, legacyMigrated: migrated.data ?? false };
}

export function serializeStore(store: RateStore): string {
  const doc: Record<string, { method: string; rates: Record<string, number> } | boolean> = {};
  for (const [id, table] of store.tables) {
    doc[id] = { method: table.method, rates: rateTableToRecord(table) };
  }
  if (store.legacyMigrated) doc[LEGACY_MIGRATED_KEY] = true;
  return yaml.dump(doc, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
    quotingType: '"',
  });
}

function readStore(file: string): RateStore {
  if (!fs.existsSync(file)) return { tables: new Map(), legacyMigrated: false };
  return parseStore(fs.readFileSync(file, "utf-8"));
}

// Whole-document replace: write beside the target, then rename over it, so a
// reader never sees a half-written file.
function writeStore(file: string, store: RateStore): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, serializeStore(store), "utf-8");
  fs.renameSync(tmp, file);
}

function readLegacy(options: StoreOptions): RateTable | undefined {
  const { legacyFile, logger } = options;
  if (!fs.existsSync(legacyFile)) return undefined;

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(legacyFile, "utf-8"));
  } catch (err) {
    logger.warn(`Could not read legacy rates from ${legacyFile}: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
  const parsed = MappingSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Ignoring legacy rates in ${legacyFile}: expected a mapping of name to percentage`);
    return undefined;
  }

  const rates: Record<string, number> = {};
  for (const [entity, value] of Object.entries(parsed.data)) {
    const rate = typeof value === "string" ? Number(value.replace(/%/g, "").trim()) : value;
    if (typeof rate === "number" && Number.isFinite(rate) && rate >= 0 && rate <= 100 && entity.trim()) {
      rates[entity] = rate;
    } else {
      logger.warn(`Dropping legacy rate for "${entity}": ${String(value)}`);
    }
  }

  const table = createRateTable("percentage", rates);
  return table.entries.size > 0 ? table : undefined;
}

/**
 * Read one category's rate table. The first read of the legacy category,
 * when the store has no record for it, copies the legacy single-category
 * file into the store and flags the store as migrated. From then on the
 * legacy file is never consulted, even if that record is later deleted.
 */
export function loadRateTable(
  categoryId: string,
  overrides: Partial<StoreOptions> = {}
): RateTable | undefined {
  const options = resolveStoreOptions(overrides);
  const id = categoryId.trim();
  const store = readStore(options.file);

  const existing = store.tables.get(id);
  if (existing) return existing;
  if (id !== options.legacyCategoryId || store.legacyMigrated) return undefined;

  const migrated = readLegacy(options);
  if (!migrated) return undefined;

  store.tables.set(id, migrated);
  store.legacyMigrated = true;
  writeStore(options.file, store);
  options.logger.info(
    `Migrated ${migrated.entries.size} legacy rate(s) from ${options.legacyFile} to "${id}"`
  );
  return migrated;
}

/** Validate and persist a rate table, replacing any previous one for the category. */
export function saveRateTable(
  categoryId: string,
  table: RateTable,
  overrides: Partial<StoreOptions> = {}
): void {
  const options = resolveStoreOptions(overrides);
  const id = categoryId.trim();
  if (!id || id === LEGACY_MIGRATED_KEY) {
    const message = id ? `"${id}" is reserved` : "Category identifier must not be empty";
    throw new ConfigError(message, [{ rule: "category-id", message }]);
  }

  const errors = checkRateTable(table);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid rate table for "${id}"`, errors);
  }

  const store = readStore(options.file);
  store.tables.set(id, { method: table.method, entries: new Map(table.entries) });
  writeStore(options.file, store);
}

export function deleteRateTable(
  categoryId: string,
  overrides: Partial<StoreOptions> = {}
): boolean {
  const options = resolveStoreOptions(overrides);
  const store = readStore(options.file);
  if (!store.tables.delete(categoryId.trim())) return false;
  writeStore(options.file, store);
  return true;
}

export function listCategories(overrides: Partial<StoreOptions> = {}): string[] {
  const options = resolveStoreOptions(overrides);
  return [...readStore(options.file).tables.keys()];
}
