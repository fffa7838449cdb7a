export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "TEMPLATE_MARKER_MISSING"
  | "UNKNOWN_MODEL"
  | "TRANSIENT_INVOCATION"
  | "SCHEMA_VALIDATION"
  | "PERSISTENCE_ERROR"
  | "AGGREGATION_INPUT"
  | "CANCELLED";

abstract class TriageError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Aborts the whole run. Raised before any model call where possible. */
export class ConfigurationError extends TriageError {
  readonly code: ErrorCode;

  constructor(
    message: string,
    code: "CONFIGURATION_ERROR" | "TEMPLATE_MARKER_MISSING" | "UNKNOWN_MODEL" = "CONFIGURATION_ERROR",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
  }
}

export class TransientInvocationError extends TriageError {
  readonly code = "TRANSIENT_INVOCATION";
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.statusCode = statusCode;
  }
}

export class SchemaValidationError extends TriageError {
  readonly code = "SCHEMA_VALIDATION";
}

export class PersistenceError extends TriageError {
  readonly code = "PERSISTENCE_ERROR";
  readonly recordId: string;

  constructor(recordId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.recordId = recordId;
  }
}

export class AggregationInputError extends TriageError {
  readonly code = "AGGREGATION_INPUT";
}

export class InvocationCancelledError extends TriageError {
  readonly code = "CANCELLED";
}

/** Retryable failures: the invoker re-sends the same prompt on these. */
export function isRetryable(err: unknown): err is TransientInvocationError | SchemaValidationError {
  return err instanceof TransientInvocationError || err instanceof SchemaValidationError;
}

export function normalizeError(err: unknown): { code: string; message: string } {
  if (err && typeof err === "object") {
    const code = "code" in err && typeof err.code === "string" ? err.code : "name" in err && typeof err.name === "string" ? err.name : "ERROR";
    const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
    return { code, message };
  }
  return { code: "ERROR", message: String(err) };
}

export function describeError(err: unknown): string {
  const { code, message } = normalizeError(err);
  return `${code}: ${message}`;
}
