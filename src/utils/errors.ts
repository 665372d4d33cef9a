// src/utils/errors.ts

export class OAuth2ClientError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Raised before any network call when the endpoint lacks a field
export class ConfigurationError extends OAuth2ClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

/**
 * The authorization or token server reported a failure, or a request lacked
 * a usable token. `code` carries the provider's error code (`invalid_grant`,
 * `access_denied`, ...) or `unknown`.
 */
export class ProtocolError extends OAuth2ClientError {
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
  }
}

export class StateMismatchError extends OAuth2ClientError {
  constructor(
    public expected: string,
    public actual: string | undefined,
    details?: Record<string, unknown>
  ) {
    super(`Expected state ${expected} but got ${actual ?? 'none'}`, 'STATE_MISMATCH', {
      ...details,
      expected,
      actual,
    });
  }
}

export class UnknownTokenTypeError extends OAuth2ClientError {
  constructor(
    public tokenType: string | undefined,
    details?: Record<string, unknown>
  ) {
    super(`Unknown token type: ${tokenType ?? 'none'}`, 'UNKNOWN_TOKEN_TYPE', details);
  }
}

// Resource request errors (only raised when the request sets throwExceptions)
export class ApiError extends OAuth2ClientError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

// Network errors
export class NetworkError extends OAuth2ClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}
