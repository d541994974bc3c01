import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { AppError, ValidationError, type FieldErrors } from '../utils/AppError';
import { getPgErrorCode, PG_FOREIGN_KEY_VIOLATION, PG_NUMERIC_OUT_OF_RANGE, PG_UNIQUE_VIOLATION } from '../utils/pgError';
import { sendResponse } from '../utils/response';

export function zodToFieldErrors(err: ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of err.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    if (errors[field] === undefined) {
      errors[field] = issue.message;
    }
  }
  return errors;
}

/** 4xx status set by Express middleware, e.g. body-parser on malformed JSON. */
function getClientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status = 'statusCode' in err ? err.statusCode : 'status' in err ? err.status : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

// Express recognises error middleware by its four parameters.
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof ValidationError) {
    return sendResponse(res, err.statusCode, err.message, { errors: err.errors });
  }
  if (err instanceof ZodError) {
    return sendResponse(res, 400, 'Validation failed', { errors: zodToFieldErrors(err) });
  }
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`${req.method} ${req.originalUrl}: ${err.message}`);
    }
    return sendResponse(res, err.statusCode, err.message);
  }

  const pgCode = getPgErrorCode(err);
  if (pgCode === PG_FOREIGN_KEY_VIOLATION) {
    return sendResponse(res, 409, 'The record is referenced by other records or references a missing one');
  }
  if (pgCode === PG_UNIQUE_VIOLATION) {
    return sendResponse(res, 409, 'A record with the same unique values already exists');
  }
  if (pgCode === PG_NUMERIC_OUT_OF_RANGE) {
    return sendResponse(res, 400, 'A numeric value is out of range');
  }

  const clientStatus = getClientErrorStatus(err);
  if (clientStatus !== undefined) {
    const message = err instanceof SyntaxError ? 'Malformed JSON body' : err instanceof Error ? err.message : 'Bad request';
    return sendResponse(res, clientStatus, message);
  }

  console.error(`${req.method} ${req.originalUrl}: ${err instanceof Error ? err.message : String(err)}`);
  if (err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  sendResponse(res, 500, 'Internal Server Error');
};
