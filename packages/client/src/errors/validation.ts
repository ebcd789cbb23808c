import type { ZodError } from 'zod';
import { PapiError } from './base.js';

/**
 * A wrapper call received JSON that does not match its schema
 * Not retryable - the cluster speaks a different API version
 */
export class ValidationError extends PapiError {
  /**
   * Zod validation errors
   */
  public readonly validationErrors?: ZodError;

  constructor(message: string, validationErrors?: ZodError) {
    super(message, { retryable: false, cause: validationErrors });
    this.validationErrors = validationErrors;
  }

  /**
   * Get a formatted string of validation errors
   */
  public getValidationDetails(): string {
    if (!this.validationErrors) {
      return this.message;
    }

    const issues = this.validationErrors.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });

    return `${this.message} - ${issues.join(', ')}`;
  }
}
