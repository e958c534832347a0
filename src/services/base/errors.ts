export class DataSourceError extends Error {
  constructor(
    message: string,
    public code: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'DataSourceError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends DataSourceError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class CredentialError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'CREDENTIAL_ERROR', cause);
    this.name = 'CredentialError';
  }
}

export class AuthenticationError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthenticationError';
  }
}

export class QueryError extends DataSourceError {
  constructor(message: string, cause?: Error) {
    super(message, 'QUERY_ERROR', cause);
    this.name = 'QueryError';
  }
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === 'string') {
    return new Error(error);
  }
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    return new Error(error.message);
  }
  return new Error(String(error));
}

/**
 * Render an error and its causes as "outer: inner: root".
 * A cause whose message is already part of its parent's is not repeated.
 */
export function formatErrorChain(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  const seen = new Set<unknown>();

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    const err = toError(current);
    const message = err.message.trim();
    if (message && !parts.some(part => part.includes(message))) {
      parts.push(message);
    }
    current = err.cause;
  }

  return parts.length > 0 ? parts.join(': ') : 'Unknown error';
}
