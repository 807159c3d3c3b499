/**
 * Failure categories surfaced to callers.
 * Every kind except RaceCondition aborts the whole operation with no mutation.
 */
export type ErrorKind =
  | 'RequiredFieldMissing'
  | 'FormatInvalid'
  | 'UniquenessViolation'
  | 'StateConflict'
  | 'ReferenceInvalid'
  | 'PermissionDenied'
  | 'RaceCondition'
  | 'NotFound'
  | 'Internal';

/**
 * REST API Error Class
 * All errors in the application should be converted to this type
 */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly kind: ErrorKind,
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ApiError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Same error with a prefix on the message, used for bulk row reporting.
   */
  withPrefix(prefix: string): ApiError {
    return new ApiError(this.statusCode, this.kind, `${prefix}${this.message}`, this.field);
  }
}

/**
 * Raised when a bulk import commit hits a conflict introduced after validation.
 * Rows listed in committedIds stay committed.
 */
export class RaceConditionError extends ApiError {
  constructor(
    message: string,
    public readonly committedIds: readonly string[]
  ) {
    super(409, 'RaceCondition', message);
    this.name = 'RaceConditionError';
  }
}

export const Errors = {
  // 400 Bad Request
  requiredField: (message: string, field?: string) =>
    new ApiError(400, 'RequiredFieldMissing', message, field),
  formatInvalid: (message: string, field?: string) =>
    new ApiError(400, 'FormatInvalid', message, field),
  referenceInvalid: (message: string, field?: string) =>
    new ApiError(400, 'ReferenceInvalid', message, field),

  // 403 Forbidden
  forbidden: (message: string, field?: string) =>
    new ApiError(403, 'PermissionDenied', message, field),

  // 404 Not Found
  notFound: (resource: string) => new ApiError(404, 'NotFound', `${resource} not found`),

  // 409 Conflict
  conflict: (message: string, field?: string) =>
    new ApiError(409, 'UniquenessViolation', message, field),
  stateConflict: (message: string, field?: string) =>
    new ApiError(409, 'StateConflict', message, field),
  raceCondition: (message: string, committedIds: readonly string[]) =>
    new RaceConditionError(message, committedIds),

  // 500 Internal Server Error
  internal: (message = 'Internal server error') => new ApiError(500, 'Internal', message),
};
