import { Request, Response, NextFunction } from 'express';
import { isRagError } from '../utils/errors.js';
import type { RagErrorCode } from '../utils/errors.js';

const STATUS_BY_CODE: Record<RagErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  INVALID_CONFIGURATION: 500,
  INGESTION_IN_PROGRESS: 409,
  EMBEDDING_SPACE_MISMATCH: 409,
  EMBEDDING_UNAVAILABLE: 503,
  GENERATION_UNAVAILABLE: 503,
  INVARIANT_VIOLATION: 500,
};

/**
 * Map pipeline errors to HTTP responses. Anything else is a 500.
 */
export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isRagError(err)) {
    const status = STATUS_BY_CODE[err.code];
    if (status >= 500) {
      console.error(`[API] ${err.name}:`, err.message);
    }
    res.status(status).json({
      error: status >= 500 && err.code !== 'EMBEDDING_UNAVAILABLE' && err.code !== 'GENERATION_UNAVAILABLE'
        ? 'Internal server error'
        : err.message,
      code: err.code,
    });
    return;
  }

  console.error('Unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
}
