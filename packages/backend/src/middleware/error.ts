import { Request, Response, NextFunction } from 'express';
import { CfpValidationError, NotFoundError } from '../lib/errors.js';

export interface ApiError extends Error {
  status_code?: number;
  status?: number; // body-parser uses 'status'
}

function status_for(err: ApiError): number {
  if (err instanceof NotFoundError) {
    return 404;
  }
  if (err instanceof CfpValidationError) {
    return 422;
  }
  return err.status_code || err.status || 500;
}

export function error_middleware(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status_code = status_for(err);
  const message = err.message || 'Internal server error';

  const log_context: Record<string, unknown> = {
    method: req.method,
    path: req.originalUrl || req.path,
    error: message,
    error_type: err.name,
    status_code,
  };

  if (status_code >= 500) {
    log_context.stack = err.stack;
  }

  req.log.error('request error', log_context);

  const body: Record<string, unknown> = {
    error: status_code >= 500 ? 'Internal server error' : message,
    request_id: req.request_id,
  };
  if (err instanceof CfpValidationError) {
    body.errors = err.errors;
  }

  res.status(status_code).json(body);
}
