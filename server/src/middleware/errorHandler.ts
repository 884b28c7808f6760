import { Request, Response, NextFunction } from 'express';
import { ResolutionError, ScoutError, SearchError } from '../errors/ScoutError';

/**
 * Run-ending errors are reported with their detail; anything else is logged
 * and answered with a generic 500.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof SearchError) {
    console.error(`[api] places search failed (${err.status})`);
    res.status(err.httpStatus).json({ error: 'Places search failed', status: err.status, details: err.body });
    return;
  }

  if (err instanceof ResolutionError) {
    res.status(err.httpStatus).json({ error: 'Cannot determine zone', reason: err.reason });
    return;
  }

  if (err instanceof ScoutError) {
    res.status(err.httpStatus).json({ error: err.message });
    return;
  }

  // body-parser failures (malformed JSON, oversized payload) carry their own 4xx status
  if (isClientHttpError(err)) {
    res.status(err.status).json({ error: err.message });
    return;
  }

  console.error('[api] unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
}

function isClientHttpError(err: unknown): err is { status: number; message: string } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}
