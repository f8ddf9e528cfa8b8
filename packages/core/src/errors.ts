export type ErrorCode =
  | "invalid_span"
  | "overlapping_spans"
  | "invalid_request"
  | "length_mismatch"
  | "invalid_config";

export class TextGuardError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

// Malformed spans: inverted, empty or out-of-bounds offsets, bad scores
export class ValidationError extends TextGuardError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = "invalid_span") {
    super(code, message, details);
  }
}

export class PreconditionError extends TextGuardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("length_mismatch", message, details);
  }
}

export class ConfigError extends TextGuardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("invalid_config", message, details);
  }
}

export function isTextGuardError(e: unknown): e is TextGuardError {
  return e instanceof TextGuardError;
}
