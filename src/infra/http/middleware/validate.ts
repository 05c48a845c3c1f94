import { RequestHandler } from 'express';
import { ZodSchema } from 'zod';

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Checks the body and path params before the route runs. Nothing on the
 * request is replaced unless every part passes; the first ZodError goes
 * to the error handler as 400 VALIDATION_ERROR.
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req, _res, next) => {
    const body = schemas.body?.safeParse(req.body);
    if (body && !body.success) {
      next(body.error);
      return;
    }
    const params = schemas.params?.safeParse(req.params);
    if (params && !params.success) {
      next(params.error);
      return;
    }

    if (body) req.body = body.data;
    if (params) req.params = params.data;
    next();
  };
}
