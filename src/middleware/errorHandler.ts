import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { HttpError } from '../errors';
import type { ErrorCode } from '../errors';

type ErrorBody = {
  success: false;
  data: null;
  message: string;
  code: ErrorCode;
  fields?: { path: string; message: string }[];
};

// body-parser marks malformed JSON with this type
function isBodyParseError(err: unknown) {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(new HttpError(404, `Route ${req.method} ${req.path} not found`, 'NOT_FOUND'));
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);

  let handled: HttpError;
  let fields: ErrorBody['fields'];

  if (err instanceof HttpError) {
    handled = err;
  } else if (err instanceof ZodError) {
    handled = new HttpError(400, 'Invalid request data', 'VALIDATION_ERROR');
    fields = err.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
  } else if (isBodyParseError(err)) {
    handled = new HttpError(400, 'Malformed JSON body', 'BAD_REQUEST');
  } else {
    handled = new HttpError(500, 'Internal Server Error', 'INTERNAL_ERROR', err);
  }

  if (handled.status >= 500) {
    console.error('Unhandled error:', handled.details);
  } else if (process.env.NODE_ENV !== 'production') {
    console.warn(`${handled.status} ${handled.message}`);
  }

  const response: ErrorBody = {
    success: false,
    data: null,
    message: handled.message,
    code: handled.code,
  };
  if (fields) response.fields = fields;
  res.status(handled.status).json(response);
}
