import type { AggregationResult, AnalysisCategory, Dataset, RateTable } from "./types.js";
import { DataError } from "./errors.js";
import { segmentPeriods } from "./period.js";
import { aggregate, cleanRows, type AggregateOptions } from "./aggregate.js";

export interface AnalyzeOptions extends AggregateOptions {
  /** Marker pattern passed to segmentPeriods(). */
  markerPattern?: RegExp;
}

/**
 * Run one category over a dataset: segment periods, normalize amounts,
 * aggregate. Throws DataError when the dataset cannot be analyzed at all;
 * row-level problems are reported in the result instead.
 */
export function analyze(
  dataset: Dataset,
  category: AnalysisCategory,
  rateTable: RateTable,
  options: AnalyzeOptions = {}
): AggregationResult {
  if (dataset.rows.length === 0) {
    throw new DataError("Dataset has no rows");
  }

  const columns = new Set(dataset.columns);
  if (!columns.has(category.entityColumn)) {
    throw new DataError(
      `Entity column "${category.entityColumn}" not found (columns: ${dataset.columns.join(", ")})`
    );
  }

  const amountColumns = category.amountColumns.filter((c) => columns.has(c));
  if (amountColumns.length === 0) {
    throw new DataError(
      `None of the amount columns ${category.amountColumns.map((c) => `"${c}"`).join(", ")} were found`
    );
  }

  const markerColumn = category.markerColumn ?? category.entityColumn;
  if (!columns.has(markerColumn)) {
    throw new DataError(`Marker column "${markerColumn}" not found`);
  }

  if (category.calculationMethod !== "sum_only" && rateTable.method !== category.calculationMethod) {
    throw new DataError(
      `Rate table holds ${rateTable.method} rates but "${category.name}" uses ${category.calculationMethod}`
    );
  }

  // The segmenter reads raw marker and amount cells; normalization happens
  // separately in cleanRows and the two meet by row index.
  const periods = segmentPeriods(dataset.rows, {
    markerColumn,
    amountColumns,
    ...(options.markerPattern ? { pattern: options.markerPattern } : {}),
  });
  const cleaning = cleanRows(dataset.rows, periods, category, amountColumns);
  return aggregate(cleaning, category, rateTable, options);
}
