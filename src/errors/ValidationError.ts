import { AppError } from './AppError';

/**
 * Field-level problems, keyed by input field (zod's flatten() shape)
 */
export interface ValidationDetails {
  formErrors: string[];
  fieldErrors: Record<string, string[] | undefined>;
}

/**
 * Validation Error (400 Bad Request)
 * Thrown when user input (ticker, share count, quote) is malformed
 */
export class ValidationError extends AppError {
  public readonly errors?: ValidationDetails;

  constructor(message: string, errors?: ValidationDetails) {
    super(message, 400);
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
