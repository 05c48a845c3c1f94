export class DomainError extends Error {
  constructor(
    message: string,
    readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Registration-time errors. The caller can correct these, so they are
 * reported with their specific message.
 */
export class RegistrationError extends DomainError {}

export class InvalidEmailError extends RegistrationError {
  constructor(message = 'Invalid email address') {
    super(message, 'INVALID_EMAIL');
  }
}

export class InvalidUsernameError extends RegistrationError {
  constructor(message = 'Username must be between 3 and 50 characters') {
    super(message, 'INVALID_USERNAME');
  }
}

export class WeakPasswordError extends RegistrationError {
  constructor(message = 'Password is too weak') {
    super(message, 'WEAK_PASSWORD');
  }
}

export class DuplicateEmailError extends RegistrationError {
  constructor(message = 'Email already registered') {
    super(message, 'DUPLICATE_EMAIL');
  }
}

export class DuplicateUsernameError extends RegistrationError {
  constructor(message = 'Username already taken') {
    super(message, 'DUPLICATE_USERNAME');
  }
}

/**
 * Authentication and authorization failures. Messages stay generic so a
 * response never tells an unknown account apart from a wrong password.
 */
export class AuthenticationError extends DomainError {
  constructor(message = 'Not authenticated', code = 'NOT_AUTHENTICATED') {
    super(message, code);
  }
}

export class InvalidCredentialsError extends AuthenticationError {
  constructor() {
    super('Incorrect username or password', 'INVALID_CREDENTIALS');
  }
}

export class InactiveAccountError extends AuthenticationError {
  constructor() {
    super('Inactive user', 'INACTIVE_ACCOUNT');
  }
}

export class UserNotFoundError extends AuthenticationError {
  constructor() {
    super('Could not validate credentials', 'USER_NOT_FOUND');
  }
}

export type InvalidTokenReason = 'Malformed' | 'Expired' | 'InvalidSignature';

/**
 * Any token the codec refuses. The HTTP layer only sees INVALID_TOKEN;
 * `reason` and `detail` are kept for logs and tests.
 */
export class InvalidTokenError extends AuthenticationError {
  constructor(
    readonly reason: InvalidTokenReason,
    readonly detail?: string
  ) {
    super('Could not validate credentials', 'INVALID_TOKEN');
  }
}

export class MalformedTokenError extends InvalidTokenError {
  constructor(detail?: string) {
    super('Malformed', detail);
  }
}

export class ExpiredTokenError extends InvalidTokenError {
  constructor(detail?: string) {
    super('Expired', detail);
  }
}

export class InvalidSignatureError extends InvalidTokenError {
  constructor(detail?: string) {
    super('InvalidSignature', detail);
  }
}
