export type ReconErrorCode = "malformed_input" | "not_found" | "backend_unavailable" | "load_failed" | "invalid_config";

export class ReconError extends Error {
  readonly code: ReconErrorCode;

  constructor(code: ReconErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A query carried a constraint value that cannot be turned into a filter. */
export class MalformedQueryError extends ReconError {
  constructor(message: string) {
    super("malformed_input", message);
  }
}

export class NotFoundError extends ReconError {
  constructor(message: string) {
    super("not_found", message);
  }
}

/** The storage layer failed while answering a read. */
export class BackendError extends ReconError {
  constructor(message: string, cause?: unknown) {
    super("backend_unavailable", message, { cause });
  }
}

export class LoadError extends ReconError {
  constructor(message: string, cause?: unknown) {
    super("load_failed", message, { cause });
  }
}

export class ConfigError extends ReconError {
  constructor(message: string) {
    super("invalid_config", message);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}
