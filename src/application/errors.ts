/**
 * Errors raised by use cases that are not about credentials or tokens.
 * The HTTP layer answers with `status` and `code` as they are.
 */
export class ApplicationError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly status: number
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends ApplicationError {
  constructor(message = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ForbiddenError extends ApplicationError {
  constructor(message = 'Not enough privileges') {
    super(message, 'FORBIDDEN', 403);
  }
}
