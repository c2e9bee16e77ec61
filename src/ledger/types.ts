export type CalculationMethod =
  | "percentage"
  | "flat_rate"
  | "sum_only";

export const VALID_METHODS: ReadonlySet<string> = new Set([
  "percentage", "flat_rate", "sum_only",
]);

export type Cell = string | number | null;

/** One data row as read from the export, keyed by header name. */
export type RawRow = Readonly<Record<string, Cell>>;

export interface Dataset {
  columns: string[];
  rows: RawRow[];
}

/**
 * A reporting interval. `ordinal` is the number pulled out of the marker
 * row ("Week 4" → 4); rows seen before any marker carry ordinal null.
 */
export interface PeriodLabel {
  ordinal: number | null;
  label: string;
}

export const UNASSIGNED_PERIOD: PeriodLabel = Object.freeze({
  ordinal: null,
  label: "Unassigned",
});

export interface PeriodAssignment {
  period: PeriodLabel;
  marker: boolean;
}

/**
 * Describes one kind of analysis over an export: which column names the
 * entity, which columns hold money, and how revenue becomes earnings.
 * Values are frozen by defineCategory().
 */
export interface AnalysisCategory {
  readonly name: string;
  readonly entityColumn: string;
  readonly amountColumns: readonly string[];
  readonly calculationMethod: CalculationMethod;
  /** Column holding period marker text. Defaults to entityColumn. */
  readonly markerColumn?: string;
  readonly description?: string;
  readonly confidence?: number;
}

export interface RateEntry {
  /** Entity name as the user wrote it. */
  entity: string;
  rate: number;
}

/** Entity → rate mapping for one category, keyed by normalizeKey(entity). */
export interface RateTable {
  method: CalculationMethod;
  entries: ReadonlyMap<string, RateEntry>;
}

export interface CleanedRow {
  index: number;
  row: RawRow;
  period: PeriodLabel;
  entityKey: string;
  entity: string;
  amounts: Map<string, number>;
  revenue: number;
}

export type SkipReason = "entity" | "amount";

export interface SkippedRow {
  index: number;
  reason: SkipReason;
}

export interface EntityFigures {
  entity: string;
  revenue: number;
  earnings: number;
  rateUsed: number;
  configured: boolean;
  rows: number;
}

export interface PeriodBreakdown {
  period: PeriodLabel;
  perEntity: Map<string, EntityFigures>;
  periodRevenue: number;
  periodEarnings: number;
}

export interface AggregationResult {
  method: CalculationMethod;
  perPeriod: PeriodBreakdown[];
  overall: {
    perEntity: Map<string, EntityFigures>;
    totalRevenue: number;
    totalEarnings: number;
  };
  skipped: {
    count: number;
    rows: SkippedRow[];
  };
  markerRows: number;
  /** Display names of entities with no rate entry, sorted. */
  unconfigured: string[];
}
