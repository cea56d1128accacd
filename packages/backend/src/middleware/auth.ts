import { Request, Response, NextFunction } from 'express';
import { config } from '../config.js';
import { constant_time_compare, hash_api_key } from '../lib/auth.js';

export function require_api_key(req: Request, res: Response, next: NextFunction): void {
  const api_key = req.header('x-api-key');

  if (!api_key) {
    req.log.warn('auth: missing API key', { path: req.path });
    res.status(401).json({ error: 'API key required' });
    return;
  }

  // Compare digests so both sides have the same length
  if (!constant_time_compare(hash_api_key(api_key), hash_api_key(config.api_key))) {
    req.log.warn('auth: invalid API key', { path: req.path });
    res.status(401).json({ error: 'Invalid API key' });
    return;
  }

  next();
}
