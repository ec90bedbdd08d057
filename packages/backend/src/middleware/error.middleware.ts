import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import type { TestResponse } from '@symtest/shared';
import { HttpError } from '../errors.js';

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  // body-parser marks its own errors (malformed JSON, oversized body) with a status
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) => {
  const message = err instanceof Error ? err.message : 'Internal server error';
  const status = statusOf(err);

  if (status >= 500) {
    console.error('[error]', err);
  } else {
    console.warn(`[error] ${status} ${message}`);
  }

  const body: TestResponse = {
    success: false,
    message,
    output: '',
    error: err instanceof HttpError && err.details ? err.details : message,
  };
  res.status(status).json(body);
};
