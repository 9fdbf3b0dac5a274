export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 2,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/**
 * Errors caused by what the user asked for (bad ids, unknown names,
 * conflicting options). Reported, never retried.
 */
export class UserError extends AppError {
  constructor(message: string, code = "USER_ERROR", cause?: unknown) {
    super(message, code, 2, cause);
    this.name = "UserError";
  }
}

export class ValidationError extends UserError {
  constructor(message: string, cause?: unknown) {
    super(message, "VALIDATION_ERROR", cause);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends UserError {
  constructor(message: string, cause?: unknown) {
    super(message, "NOT_FOUND", cause);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends UserError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFLICT", cause);
    this.name = "ConflictError";
  }
}

/**
 * A batch row collides with a reserved output key. Fatal for the whole batch.
 */
export class MergeConflictError extends UserError {
  constructor(message: string, cause?: unknown) {
    super(message, "MERGE_CONFLICT", cause);
    this.name = "MergeConflictError";
  }
}

/**
 * Unparsable or structurally invalid persisted state (config, sessions).
 */
export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", 2, cause);
    this.name = "ConfigError";
  }
}

export type LlmErrorInfo = Record<string, unknown>;

export class LlmError extends AppError {
  readonly errorInfo: LlmErrorInfo;

  constructor(message: string, errorInfo?: LlmErrorInfo, cause?: unknown) {
    super(message, "LLM_ERROR", 2, cause);
    this.name = "LlmError";
    this.errorInfo = errorInfo ?? {};
  }
}
