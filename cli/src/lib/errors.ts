export class EstailError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "EstailError";
    this.exitCode = exitCode;
  }
}

/** Bad parameter combination or malformed --select/--where value. */
export class ValidationError extends EstailError {
  constructor(message: string) {
    super(message, 2);
    this.name = "ValidationError";
  }
}

export class ConfigError extends EstailError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class DateParseError extends EstailError {
  constructor(message: string) {
    super(message, 2);
    this.name = "DateParseError";
  }
}

/** The request never produced an HTTP response (DNS, refused connection, reset). */
export class NetworkError extends EstailError {
  constructor(message: string) {
    super(message);
    this.name = "NetworkError";
  }
}

export class ParseError extends EstailError {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class SearchServiceError extends EstailError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "SearchServiceError";
    this.status = status;
  }
}

export class AuthError extends EstailError {
  constructor(message = "Authentication failed") {
    super(message);
    this.name = "AuthError";
  }
}

const ERROR_LABELS: Record<string, string> = {
  ValidationError: "Validation error",
  ConfigError: "Configuration error",
  DateParseError: "Date error",
  NetworkError: "Network error",
  ParseError: "Parse error",
  SearchServiceError: "Search service error",
  AuthError: "Authentication error",
};

export function describeError(error: unknown): string {
  if (error instanceof EstailError) {
    const label = ERROR_LABELS[error.name];
    return label ? `${label}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export function exitCodeFor(error: unknown): number {
  return error instanceof EstailError ? error.exitCode : 1;
}

/**
 * Failures worth retrying while tailing: no response at all, throttling,
 * or a server-side error.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (error instanceof SearchServiceError) {
    return error.status === 429 || error.status >= 500;
  }
  return false;
}
