import type {
  AggregationResult,
  AnalysisCategory,
  CalculationMethod,
  CleanedRow,
  EntityFigures,
  PeriodAssignment,
  PeriodBreakdown,
  PeriodLabel,
  RateEntry,
  RateTable,
  RawRow,
  SkippedRow,
} from "./types.js";
import { normalizeAmount } from "./amount.js";
import { cellText, normalizeKey } from "./helpers.js";
import { comparePeriods } from "./period.js";
import { lookupRate } from "./rates.js";

export interface CleaningResult {
  rows: CleanedRow[];
  skipped: SkippedRow[];
  markerRows: number;
}

/**
 * Merge period assignments into the rows by index and normalize each row's
 * money columns. Marker rows drop out; rows without an entity, or where no
 * money column yields a number, are recorded as skipped.
 */
export function cleanRows(
  rows: readonly RawRow[],
  periods: readonly PeriodAssignment[],
  category: AnalysisCategory,
  amountColumns: readonly string[] = category.amountColumns
): CleaningResult {
  if (periods.length !== rows.length) {
    throw new RangeError(
      `Period assignments (${periods.length}) do not line up with rows (${rows.length})`
    );
  }

  const cleaned: CleanedRow[] = [];
  const skipped: SkippedRow[] = [];
  let markerRows = 0;

  rows.forEach((row, index) => {
    const { period, marker } = periods[index];
    if (marker) {
      markerRows++;
      return;
    }

    const entity = cellText(row[category.entityColumn]).replace(/\s+/g, " ");
    if (!entity) {
      skipped.push({ index, reason: "entity" });
      return;
    }

    const amounts = new Map<string, number>();
    let revenue = 0;
    for (const col of amountColumns) {
      const value = normalizeAmount(row[col]);
      if (value === null) continue;
      amounts.set(col, value);
      revenue += value;
    }
    if (amounts.size === 0) {
      skipped.push({ index, reason: "amount" });
      return;
    }

    cleaned.push({ index, row, period, entityKey: normalizeKey(entity), entity, amounts, revenue });
  });

  return { rows: cleaned, skipped, markerRows };
}

export interface AggregateOptions {
  /**
   * List configured entities in every period (and overall) even when they
   * have no rows there, with zero revenue and earnings.
   */
  includeIdleEntities?: boolean;
}

interface Group {
  entity: string;
  revenue: number;
  rows: number;
}

/**
 * Group cleaned rows by (period, entity), apply the calculation method and
 * roll everything up. Overall figures come from the rows themselves, not
 * from the per-period results.
 */
export function aggregate(
  cleaning: CleaningResult,
  category: AnalysisCategory,
  rateTable: RateTable,
  options: AggregateOptions = {}
): AggregationResult {
  const method = category.calculationMethod;
  const byPeriod = new Map<string, { period: PeriodLabel; groups: Map<string, Group> }>();
  const overallGroups = new Map<string, Group>();

  for (const row of cleaning.rows) {
    const periodKey = row.period.ordinal === null ? "unassigned" : String(row.period.ordinal);
    let bucket = byPeriod.get(periodKey);
    if (!bucket) {
      bucket = { period: row.period, groups: new Map() };
      byPeriod.set(periodKey, bucket);
    }
    addToGroup(bucket.groups, row);
    addToGroup(overallGroups, row);
  }

  const idle = options.includeIdleEntities && method !== "sum_only";
  const perPeriod: PeriodBreakdown[] = [...byPeriod.values()]
    .sort((a, b) => comparePeriods(a.period, b.period))
    .map(({ period, groups }) => {
      if (idle) addIdleEntities(groups, rateTable);
      const perEntity = computeFigures(groups, method, rateTable);
      return {
        period,
        perEntity,
        periodRevenue: sumOf(perEntity, "revenue"),
        periodEarnings: sumOf(perEntity, "earnings"),
      };
    });

  if (idle) addIdleEntities(overallGroups, rateTable);
  const overallPerEntity = computeFigures(overallGroups, method, rateTable);

  const unconfigured = [...overallPerEntity.values()]
    .filter((f) => !f.configured)
    .map((f) => f.entity)
    .sort();

  return {
    method,
    perPeriod,
    overall: {
      perEntity: overallPerEntity,
      totalRevenue: sumOf(overallPerEntity, "revenue"),
      totalEarnings: sumOf(overallPerEntity, "earnings"),
    },
    skipped: { count: cleaning.skipped.length, rows: cleaning.skipped },
    markerRows: cleaning.markerRows,
    unconfigured,
  };
}

function addToGroup(groups: Map<string, Group>, row: CleanedRow): void {
  const group = groups.get(row.entityKey);
  if (group) {
    group.revenue += row.revenue;
    group.rows++;
  } else {
    groups.set(row.entityKey, { entity: row.entity, revenue: row.revenue, rows: 1 });
  }
}

function addIdleEntities(groups: Map<string, Group>, rateTable: RateTable): void {
  for (const [key, entry] of rateTable.entries) {
    if (!groups.has(key)) groups.set(key, { entity: entry.entity, revenue: 0, rows: 0 });
  }
}

function computeFigures(
  groups: Map<string, Group>,
  method: CalculationMethod,
  rateTable: RateTable
): Map<string, EntityFigures> {
  const figures = new Map<string, EntityFigures>();
  const keys = [...groups.keys()].sort();
  for (const key of keys) {
    const group = groups.get(key);
    if (!group) continue;
    const entry = method === "sum_only" ? undefined : lookupRate(rateTable, key);
    figures.set(key, {
      entity: entry?.entity ?? group.entity,
      revenue: group.revenue,
      rows: group.rows,
      ...applyMethod(method, group, entry),
    });
  }
  return figures;
}

/**
 * percentage: revenue × rate / 100
 * flat_rate:  rate × number of rows
 * sum_only:   revenue; every entity counts as configured
 * A missing rate earns nothing and marks the entity unconfigured.
 */
export function applyMethod(
  method: CalculationMethod,
  group: { revenue: number; rows: number },
  entry: RateEntry | undefined
): Pick<EntityFigures, "earnings" | "rateUsed" | "configured"> {
  switch (method) {
    case "sum_only":
      return { earnings: group.revenue, rateUsed: 0, configured: true };
    case "percentage":
      if (!entry) return { earnings: 0, rateUsed: 0, configured: false };
      return { earnings: (group.revenue * entry.rate) / 100, rateUsed: entry.rate, configured: true };
    case "flat_rate":
      if (!entry) return { earnings: 0, rateUsed: 0, configured: false };
      return { earnings: entry.rate * group.rows, rateUsed: entry.rate, configured: true };
  }
}

function sumOf(figures: Map<string, EntityFigures>, field: "revenue" | "earnings"): number {
  let total = 0;
  for (const f of figures.values()) total += f[field];
  return total;
}
