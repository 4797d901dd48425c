import { AppError } from './AppError';

/**
 * Not Found Error (404)
 * Unknown ticker in the directory, equity not held, expired or unknown draft
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}
