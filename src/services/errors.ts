/**
 * Engine error taxonomy.
 *
 * Only call-boundary failures are thrown. Row-level problems (schema
 * violations, orphan references, undefined metrics) are returned as data
 * alongside the rows that did process.
 */

import type { Violation } from "./schema-validator";

export class EngineError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "EngineError";
  }
}

/**
 * Invalid model name, weight, half-life or baseline parameter.
 * Raised before any computation starts; never replaced by a default.
 */
export class ConfigurationError extends EngineError {
  constructor(message: string, details?: unknown) {
    super("CONFIGURATION_ERROR", message, details);
    this.name = "ConfigurationError";
  }
}

/**
 * A strict-mode load that had at least one schema violation.
 */
export class SchemaRejectedError extends EngineError {
  constructor(
    public readonly kind: string,
    public readonly violations: Violation[]
  ) {
    super(
      "SCHEMA_VIOLATION",
      `${kind} dataset rejected: ${violations.length} schema violation(s)`,
      violations
    );
    this.name = "SchemaRejectedError";
  }
}
