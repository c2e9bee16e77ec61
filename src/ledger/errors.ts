export interface ValidationError {
  rule: string;
  message: string;
  path?: string;
}

/** The dataset cannot be analyzed at all (empty, missing columns). */
export class DataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataError";
  }
}

/**
 * A category or rate table failed structural checks. `errors` holds every
 * violation found, not just the first.
 */
export class ConfigError extends Error {
  readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[] = []) {
    const detail = errors.map((e) => `  - ${e.message}`).join("\n");
    super(detail ? `${message}\n${detail}` : message);
    this.name = "ConfigError";
    this.errors = errors;
  }
}
