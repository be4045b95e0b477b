import { NdError } from './base.js';

/**
 * Credential resolution error - a required field is empty after every source
 * was consulted, or the vault could not be read
 */
export class CredentialError extends NdError {
  /**
   * Required fields that no source provided
   */
  public readonly missingFields: readonly string[];

  constructor(
    message: string,
    options?: { missingFields?: readonly string[]; cause?: Error },
  ) {
    super(message, { retryable: false, cause: options?.cause });
    this.missingFields = options?.missingFields ?? [];
  }
}
