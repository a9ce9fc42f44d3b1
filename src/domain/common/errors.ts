export type ErrorKind = "config" | "validation" | "provider" | "unknown";

export class AppError extends Error {
  readonly kind: ErrorKind;
  override readonly cause?: unknown;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.cause = cause;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("config", message, cause);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("validation", message, cause);
  }
}

export type ProviderErrorCategory =
  | "authentication"
  | "bad_request"
  | "rate_limit"
  | "server_error"
  | "timeout"
  | "connection"
  | "cancelled"
  | "unknown";

export type ProviderErrorParams = {
  message: string;
  provider?: string;
  statusCode?: number;
  cause?: unknown;
};

export class ProviderError extends AppError {
  readonly category: ProviderErrorCategory;
  readonly provider?: string;
  readonly statusCode?: number;
  readonly retryable: boolean;

  constructor(
    category: ProviderErrorCategory,
    retryable: boolean,
    params: ProviderErrorParams,
  ) {
    super("provider", params.message, params.cause);
    this.category = category;
    this.provider = params.provider;
    this.statusCode = params.statusCode;
    this.retryable = retryable;
  }
}

export class AuthenticationError extends ProviderError {
  constructor(params: ProviderErrorParams) {
    super("authentication", false, params);
  }
}

export class BadRequestError extends ProviderError {
  constructor(params: ProviderErrorParams) {
    super("bad_request", false, params);
  }
}

export class RateLimitError extends ProviderError {
  constructor(params: ProviderErrorParams) {
    super("rate_limit", true, params);
  }
}

export class ServerError extends ProviderError {
  constructor(params: ProviderErrorParams) {
    super("server_error", true, params);
  }
}

export class TimeoutError extends ProviderError {
  constructor(params: ProviderErrorParams) {
    super("timeout", true, params);
  }
}

export class ConnectionError extends ProviderError {
  constructor(params: ProviderErrorParams) {
    super("connection", true, params);
  }
}

export class CancelledError extends ProviderError {
  constructor(params: ProviderErrorParams) {
    super("cancelled", false, params);
  }
}

export class UnknownApiError extends ProviderError {
  constructor(params: ProviderErrorParams) {
    super("unknown", false, params);
  }
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error)
    return new AppError("unknown", error.message, error);
  return new AppError("unknown", String(error));
}
