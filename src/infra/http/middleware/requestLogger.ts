import { Request, Response, NextFunction } from 'express';
import { logger } from '../../logger.js';

/**
 * Logs one line per request at `http` level once the response is sent.
 * Only the path is logged, never headers or bodies.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();

  res.on('finish', () => {
    const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    logger.http(`${req.method} ${req.originalUrl} ${res.statusCode} ${elapsedMs.toFixed(1)}ms`);
  });

  next();
}
