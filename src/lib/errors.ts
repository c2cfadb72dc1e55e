export type ProviderErrorCode =
  | "missing_api_key"
  | "rate_limited"
  | "network"
  | "server_error"
  | "request_failed"
  | "timeout"
  | "empty_response"
  | "invalid_response"
  | "parse_failed"
  | "retries_exhausted";

/** Fatal misconfiguration. Raised while services are assembled, never per request. */
export class ConfigurationError extends Error {
  readonly code = "configuration_error";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class TransientProviderError extends Error {
  readonly code: ProviderErrorCode;

  constructor(code: ProviderErrorCode, message: string) {
    super(message);
    this.name = "TransientProviderError";
    this.code = code;
  }
}

export class PermanentProviderError extends Error {
  readonly code: ProviderErrorCode;
  readonly status = 502;

  constructor(code: ProviderErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PermanentProviderError";
    this.code = code;
  }
}

export class ValidationError extends Error {
  readonly code = "validation_error";
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConcurrencyConflictError extends Error {
  readonly code = "conflict";
  readonly status = 409;
  readonly details?: Record<string, string>;

  constructor(message: string, details?: Record<string, string>) {
    super(message);
    this.name = "ConcurrencyConflictError";
    this.details = details;
  }
}

export class NotFoundError extends Error {
  readonly code = "not_found";
  readonly status = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class AccessDeniedError extends Error {
  readonly code = "access_denied";
  readonly status = 403;

  constructor(message: string) {
    super(message);
    this.name = "AccessDeniedError";
  }
}

export type DomainError =
  | PermanentProviderError
  | ValidationError
  | ConcurrencyConflictError
  | NotFoundError
  | AccessDeniedError;

export function isDomainError(error: unknown): error is DomainError {
  return (
    error instanceof PermanentProviderError ||
    error instanceof ValidationError ||
    error instanceof ConcurrencyConflictError ||
    error instanceof NotFoundError ||
    error instanceof AccessDeniedError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/** Maps an HTTP status from a provider to the transient/permanent split. */
export function classifyProviderStatus(status: number, message: string): TransientProviderError | PermanentProviderError {
  if (status === 429) {
    return new TransientProviderError("rate_limited", message);
  }
  if (status === 408 || status >= 500) {
    return new TransientProviderError("server_error", message);
  }
  return new PermanentProviderError("request_failed", message);
}
