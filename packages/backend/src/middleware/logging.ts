import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { logger, type Logger } from '../lib/logger.js';

declare global {
  namespace Express {
    interface Request {
      request_id: string;
      log: Logger;
    }
  }
}

function completion_level(status: number): 'info' | 'warn' | 'error' {
  if (status >= 500) {
    return 'error';
  }
  return status >= 400 ? 'warn' : 'info';
}

export function logging_middleware(req: Request, res: Response, next: NextFunction): void {
  // Keep an id handed over by a proxy so log lines can be joined up
  const request_id = req.header('x-request-id') ?? randomUUID();
  req.request_id = request_id;
  req.log = logger.child({ request_id });
  res.setHeader('x-request-id', request_id);

  const start = Date.now();

  res.on('finish', () => {
    req.log[completion_level(res.statusCode)]('request completed', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Date.now() - start,
    });
  });

  next();
}
