import type { NextFunction, RequestHandler, Response } from 'express';
import type { AuthRequest } from './auth.js';

type AsyncRoute = (req: AuthRequest, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Wrap an async route so it returns void (no-misused-promises) and a
 * rejected promise reaches the error handler through next().
 */
export function asyncHandler(fn: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
