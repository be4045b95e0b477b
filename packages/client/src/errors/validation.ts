import type { ZodError, ZodIssue } from 'zod';
import { NdError } from './base.js';

/**
 * Caller input or configuration rejected before anything was sent
 */
export class ValidationError extends NdError {
  public readonly validationErrors?: ZodError;

  /**
   * Issues behind the rejection; empty when raised without a schema
   */
  public readonly issues: readonly ZodIssue[];

  constructor(message: string, validationErrors?: ZodError) {
    super(message, { retryable: false });
    this.validationErrors = validationErrors;
    this.issues = validationErrors?.issues ?? [];
  }

  /**
   * Message followed by each offending field, e.g.
   * `Invalid input for Get Fabric: fabric_name (String must contain at most 64 character(s))`.
   * A value rejected as a whole is named `input`.
   */
  public getValidationDetails(): string {
    if (this.issues.length === 0) {
      return this.message;
    }

    const fields = this.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'input';
      return `${field} (${issue.message})`;
    });
    return `${this.message}: ${fields.join('; ')}`;
  }
}
