export type ErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_KEY'
  | 'CONFLICT'
  | 'VALIDATION_ERROR'
  | 'BAD_REQUEST'
  | 'INTERNAL_ERROR';

export class HttpError extends Error {
  status: number;
  code: ErrorCode;
  details?: unknown;

  constructor(status: number, message: string, code: ErrorCode, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/** A referenced id does not resolve. */
export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message, 'NOT_FOUND');
  }
}

/** A uniqueness constraint would be violated. */
export class DuplicateKeyError extends HttpError {
  constructor(message: string) {
    super(400, message, 'DUPLICATE_KEY');
  }
}

/** A delete is blocked by records that still reference the target. */
export class ConflictError extends HttpError {
  constructor(message: string) {
    super(400, message, 'CONFLICT');
  }
}
