export class DevExplainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "DevExplainError";
  }
}

export class ConfigError extends DevExplainError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

/** Bad user input: unsupported language, missing file, malformed option. */
export class ValidationError extends DevExplainError {
  constructor(message: string, cause?: unknown) {
    super(message, "VALIDATION_ERROR", cause);
    this.name = "ValidationError";
  }
}

export class BackendError extends DevExplainError {
  constructor(message: string, cause?: unknown, code = "BACKEND_ERROR") {
    super(message, code, cause);
    this.name = "BackendError";
  }
}

/** No credential could be resolved for any backend. */
export class BackendNotAvailableError extends BackendError {
  constructor(message: string, cause?: unknown) {
    super(message, cause, "BACKEND_UNAVAILABLE");
    this.name = "BackendNotAvailableError";
  }
}

export class ProcessError extends DevExplainError {
  constructor(message: string, cause?: unknown) {
    super(message, "PROCESS_ERROR", cause);
    this.name = "ProcessError";
  }
}

export class StorageError extends DevExplainError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORAGE_ERROR", cause);
    this.name = "StorageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
