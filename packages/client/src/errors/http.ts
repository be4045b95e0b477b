import { NdError } from './base.js';

/**
 * Network error (connection issues, timeouts) for a single attempt
 * Retryable by default
 */
export class NetworkError extends NdError {
  constructor(message: string, cause?: Error) {
    super(message, { retryable: true, cause });
  }
}

/**
 * Server error (5xx) for a single attempt
 * Retryable by default
 */
export class ServerError extends NdError {
  constructor(message: string, statusCode = 500) {
    super(message, { retryable: true, statusCode });
  }
}

/**
 * Authentication error - the controller rejected the login
 * Not retryable - requires new credentials
 */
export class AuthenticationError extends NdError {
  constructor(message = 'Authentication failed', statusCode?: number) {
    super(message, { retryable: false, statusCode });
  }
}

/**
 * Transport error - retries exhausted or an unrecoverable network fault
 */
export class TransportError extends NdError {
  /**
   * Number of attempts made before giving up
   */
  public readonly attempts: number;

  constructor(
    message: string,
    options: { attempts: number; cause?: Error; statusCode?: number },
  ) {
    super(message, {
      retryable: false,
      cause: options.cause,
      statusCode: options.statusCode,
    });
    this.attempts = options.attempts;
  }
}

/**
 * Response format error - a successful status carrying a body that cannot be parsed
 */
export class ResponseFormatError extends NdError {
  /**
   * Raw body as received from the controller
   */
  public readonly body: string;

  constructor(message: string, body: string, statusCode?: number) {
    super(message, { retryable: false, statusCode });
    this.body = body;
  }
}
