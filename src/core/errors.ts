/**
 * Error taxonomy shared by every layer.
 *
 * The HTTP boundary maps these to status codes; nothing below it catches them.
 */
export type DialogServiceErrorCode = 'VALIDATION_ERROR' | 'PERSISTENCE_ERROR' | 'NOT_FOUND';

export abstract class DialogServiceError extends Error {
  abstract readonly code: DialogServiceErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed input shape or out-of-range value
 */
export class ValidationError extends DialogServiceError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

/**
 * Store unreachable or a constraint was violated
 */
export class PersistenceError extends DialogServiceError {
  readonly code = 'PERSISTENCE_ERROR';
}

export class NotFoundError extends DialogServiceError {
  readonly code = 'NOT_FOUND';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
