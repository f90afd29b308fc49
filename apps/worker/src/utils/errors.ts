export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Missing or invalid settings. Fatal before any connection is made. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/** Local or source store unreachable. */
export class ConnectivityError extends AppError {
  constructor(message: string) {
    super(message, 'CONNECTIVITY');
    this.name = 'ConnectivityError';
  }
}

/** Bad identifiers, missing columns, malformed model replies. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

/** Unsupported provider or model, or a failed gateway call. */
export class ProviderError extends AppError {
  constructor(message: string) {
    super(message, 'PROVIDER');
    this.name = 'ProviderError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
