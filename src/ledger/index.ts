export type {
  CalculationMethod,
  Cell,
  RawRow,
  Dataset,
  PeriodLabel,
  PeriodAssignment,
  AnalysisCategory,
  RateEntry,
  RateTable,
  CleanedRow,
  SkipReason,
  SkippedRow,
  EntityFigures,
  PeriodBreakdown,
  AggregationResult,
} from "./types.js";
export { VALID_METHODS, UNASSIGNED_PERIOD } from "./types.js";

export { DataError, ConfigError } from "./errors.js";
export type { ValidationError } from "./errors.js";

export { normalizeAmount } from "./amount.js";
export { normalizeKey } from "./helpers.js";

export { segmentPeriods, comparePeriods, DEFAULT_MARKER_PATTERN } from "./period.js";
export type { SegmentOptions } from "./period.js";

export {
  defineCategory,
  parseCategory,
  categoryId,
  dispatcherEarnings,
  driverPayments,
  brokerPerformance,
} from "./category.js";
export type { CategoryInput, PresetColumns } from "./category.js";

export {
  validateConfig,
  createRateTable,
  emptyRateTable,
  checkRateTable,
  lookupRate,
  rateTableToRecord,
} from "./rates.js";
export type { ConfigLineError, ParsedConfig } from "./rates.js";

export {
  loadRateTable,
  saveRateTable,
  deleteRateTable,
  listCategories,
  parseStore,
  serializeStore,
  LEGACY_MIGRATED_KEY,
} from "./store.js";
export type { RateStore } from "./store.js";
export { resolveStoreOptions, DEFAULT_STORE_FILE, DEFAULT_LEGACY_FILE, LEGACY_CATEGORY_ID } from "./config.js";
export type { StoreOptions, Logger } from "./config.js";

export { cleanRows, aggregate, applyMethod } from "./aggregate.js";
export type { CleaningResult, AggregateOptions } from "./aggregate.js";

export { analyze } from "./analyze.js";
export type { AnalyzeOptions } from "./analyze.js";

export { readDataset, loadDataset } from "./dataset.js";
export type { ReadOptions } from "./dataset.js";
