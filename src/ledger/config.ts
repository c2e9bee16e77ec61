import * as path from "node:path";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export interface StoreOptions {
  /** YAML document holding every category's rate table. */
  file: string;
  /** Single-category JSON file written by older releases. */
  legacyFile: string;
  /** Identifier the legacy rates migrate under. */
  legacyCategoryId: string;
  logger: Logger;
}

export const DEFAULT_STORE_FILE = "rate_tables.yaml";
export const DEFAULT_LEGACY_FILE = "dispatcher_config.json";
export const LEGACY_CATEGORY_ID = "dispatcher_earnings";

/**
 * Fill in store options. Explicit overrides win, then RATE_LEDGER_STORE and
 * RATE_LEDGER_LEGACY_FILE, then files in the working directory.
 */
export function resolveStoreOptions(
  overrides: Partial<StoreOptions> = {},
  env: NodeJS.ProcessEnv = process.env
): StoreOptions {
  return {
    file: path.resolve(overrides.file ?? env.RATE_LEDGER_STORE ?? DEFAULT_STORE_FILE),
    legacyFile: path.resolve(
      overrides.legacyFile ?? env.RATE_LEDGER_LEGACY_FILE ?? DEFAULT_LEGACY_FILE
    ),
    legacyCategoryId: overrides.legacyCategoryId ?? LEGACY_CATEGORY_ID,
    logger: overrides.logger ?? console,
  };
}
