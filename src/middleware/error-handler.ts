import type { Request, Response, NextFunction } from 'express';
import { HttpError } from '../errors/index.js';

// Express recognises error middleware by its four parameters.
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  console.error('Error:', err);

  if (err instanceof HttpError) {
    return res.status(err.status).json({ error: err.message });
  }

  // body-parser errors (malformed JSON, oversized body) carry their own status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return res.status(err.status).json({ error: err.message || 'An error occurred' });
  }

  res.status(500).json({
    error: err instanceof Error && err.message ? err.message : 'Internal server error',
  });
}
