import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  AuthenticationError,
  DomainError,
  InvalidTokenError,
  RegistrationError,
} from '../../../domain/auth/errors.js';
import { ApplicationError } from '../../../application/errors.js';
import { logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

const CLIENT_ERRORS: Record<number, ErrorResponse> = {
  400: { code: 'BAD_REQUEST', message: 'Bad request' },
  413: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large' },
  415: { code: 'UNSUPPORTED_MEDIA_TYPE', message: 'Unsupported request body encoding' },
};

/** The 4xx status an http-errors style error carries, if any. */
function clientErrorStatus(err: Error): number | null {
  const status =
    'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && Number.isInteger(status) && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

function send(res: Response, status: number, response: ErrorResponse): void {
  res.status(status).json(response);
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Request-shape validation -> 400
  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  // Weak password, bad email/username, duplicates -> 400 with the specific message
  if (err instanceof RegistrationError) {
    send(res, 400, { code: err.code, message: err.message });
    return;
  }

  // Credentials, tokens, inactive or vanished accounts -> 401 with a generic message
  if (err instanceof AuthenticationError) {
    if (err instanceof InvalidTokenError) {
      logger.debug('Invalid token', { reason: err.reason, path: req.originalUrl });
    }
    res.setHeader('WWW-Authenticate', 'Bearer');
    send(res, 401, { code: err.code, message: err.message });
    return;
  }

  // Missing privileges, unknown target user
  if (err instanceof ApplicationError) {
    send(res, err.status, { code: err.code, message: err.message });
    return;
  }

  // Malformed JSON or form bodies rejected by the body parsers
  if ('type' in err && err.type === 'entity.parse.failed') {
    send(res, 400, { code: 'VALIDATION_ERROR', message: 'Malformed request body' });
    return;
  }

  // Other body-parser rejections (oversized body, unsupported charset or encoding)
  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    send(res, clientStatus, CLIENT_ERRORS[clientStatus] ?? CLIENT_ERRORS[400]);
    return;
  }

  if (err instanceof DomainError) {
    logger.warn('Unmapped domain error', { code: err.code, message: err.message });
    send(res, 400, { code: err.code, message: err.message });
    return;
  }

  // Anything else is a server fault: log everything, return nothing
  logger.error('Unhandled error', {
    method: req.method,
    path: req.originalUrl,
    error: err.message,
    stack: err.stack,
  });
  send(res, 500, {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  });
}
