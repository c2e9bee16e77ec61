import { z } from "zod";
import type { AnalysisCategory, CalculationMethod } from "./types.js";
import { VALID_METHODS } from "./types.js";
import { ConfigError, type ValidationError } from "./errors.js";

export interface CategoryInput {
  name: string;
  entityColumn: string;
  amountColumns: readonly string[];
  calculationMethod: CalculationMethod;
  markerColumn?: string;
  description?: string;
  confidence?: number;
}

/**
 * Validate a category descriptor and return a frozen copy. Column names are
 * trimmed; duplicate amount columns collapse to one.
 */
export function defineCategory(input: CategoryInput): AnalysisCategory {
  const errors = checkCategory(input);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid category "${input.name}"`, errors);
  }

  const amountColumns = [...new Set(input.amountColumns.map((c) => c.trim()))];
  const markerColumn = input.markerColumn?.trim() ?? "";
  const category: AnalysisCategory = {
    name: input.name.trim(),
    entityColumn: input.entityColumn.trim(),
    amountColumns: Object.freeze(amountColumns),
    calculationMethod: input.calculationMethod,
    ...(markerColumn ? { markerColumn } : {}),
    ...(input.description !== undefined ? { description: input.description } : {}),
    ...(input.confidence !== undefined ? { confidence: input.confidence } : {}),
  };
  return Object.freeze(category);
}

function checkCategory(input: CategoryInput): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!input.name.trim()) {
    errors.push({ rule: "category-name", message: "Category name must not be empty", path: "name" });
  }
  if (!input.entityColumn.trim()) {
    errors.push({ rule: "entity-column", message: "Entity column must not be empty", path: "entityColumn" });
  }
  const amountColumns = input.amountColumns.filter((c) => c.trim() !== "");
  if (amountColumns.length === 0) {
    errors.push({
      rule: "amount-columns",
      message: "At least one amount column is required",
      path: "amountColumns",
    });
  }
  if (amountColumns.length !== input.amountColumns.length) {
    errors.push({
      rule: "amount-columns",
      message: "Amount column names must not be empty",
      path: "amountColumns",
    });
  }
  if (!VALID_METHODS.has(input.calculationMethod)) {
    errors.push({
      rule: "calculation-method",
      message: `Unknown calculation method "${input.calculationMethod}" (expected one of ${[...VALID_METHODS].join(", ")})`,
      path: "calculationMethod",
    });
  }
  if (
    input.confidence !== undefined &&
    !(Number.isFinite(input.confidence) && input.confidence >= 0 && input.confidence <= 1)
  ) {
    errors.push({
      rule: "confidence",
      message: `Confidence must be between 0 and 1, got ${input.confidence}`,
      path: "confidence",
    });
  }

  return errors;
}

// Advisors answer in either naming style.
const CategoryRecordSchema = z.object({
  name: z.string(),
  entityColumn: z.string().optional(),
  entity_column: z.string().optional(),
  amountColumns: z.array(z.string()).optional(),
  amount_columns: z.array(z.string()).optional(),
  calculationMethod: z.enum(["percentage", "flat_rate", "sum_only"]).optional(),
  calculation_method: z.enum(["percentage", "flat_rate", "sum_only"]).optional(),
  markerColumn: z.string().optional(),
  marker_column: z.string().optional(),
  description: z.string().optional(),
  confidence: z.number().optional(),
});

/**
 * Build a category from a loosely-typed record, such as the JSON a column
 * advisor proposes. The method defaults to percentage.
 */
export function parseCategory(record: unknown): AnalysisCategory {
  const parsed = CategoryRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid category record",
      parsed.error.issues.map((issue) => ({
        rule: "category-shape",
        message: `${issue.path.join(".") || "record"}: ${issue.message}`,
        path: issue.path.join("."),
      }))
    );
  }

  const data = parsed.data;
  const markerColumn = data.markerColumn ?? data.marker_column;
  return defineCategory({
    name: data.name,
    entityColumn: data.entityColumn ?? data.entity_column ?? "",
    amountColumns: data.amountColumns ?? data.amount_columns ?? [],
    calculationMethod: data.calculationMethod ?? data.calculation_method ?? "percentage",
    ...(markerColumn !== undefined ? { markerColumn } : {}),
    ...(data.description !== undefined ? { description: data.description } : {}),
    ...(data.confidence !== undefined ? { confidence: data.confidence } : {}),
  });
}

/** Storage identifier: "Dispatcher Earnings" → "dispatcher_earnings". */
export function categoryId(category: AnalysisCategory | string): string {
  const name = typeof category === "string" ? category : category.name;
  return name.trim().toLowerCase().replace(/\s+/g, "_");
}

export interface PresetColumns {
  entityColumn: string;
  amountColumns: readonly string[];
  markerColumn?: string;
  confidence?: number;
}

export function dispatcherEarnings(columns: PresetColumns): AnalysisCategory {
  return defineCategory({
    ...columns,
    name: "Dispatcher Earnings",
    calculationMethod: "percentage",
    description: "Earnings for each dispatcher as a percentage of the revenue they booked",
  });
}

export function driverPayments(columns: PresetColumns): AnalysisCategory {
  return defineCategory({
    ...columns,
    name: "Driver Payments",
    calculationMethod: "percentage",
    description: "Payments for each driver as a percentage of the revenue they hauled",
  });
}

export function brokerPerformance(columns: PresetColumns): AnalysisCategory {
  return defineCategory({
    ...columns,
    name: "Broker Performance",
    calculationMethod: "sum_only",
    description: "Revenue totals by broker or customer",
  });
}
