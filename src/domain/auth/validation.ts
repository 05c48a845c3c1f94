import { z } from 'zod';
import {
  InvalidEmailError,
  InvalidUsernameError,
  RegistrationError,
  WeakPasswordError,
} from './errors.js';

export const USERNAME_MIN_LENGTH = 3;
export const USERNAME_MAX_LENGTH = 50;
export const PASSWORD_MIN_LENGTH = 8;
// Width of users.email
export const EMAIL_MAX_LENGTH = 320;

export type ValidationErrorKind = 'InvalidEmail' | 'InvalidUsername' | 'WeakPassword';

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: ValidationErrorKind; message: string };

export interface RegistrationInput {
  email: string;
  username: string;
  fullName: string | null;
  password: string;
}

const emailSchema = z.string().max(EMAIL_MAX_LENGTH).email();

function fail(kind: ValidationErrorKind, message: string): ValidationResult<never> {
  return { ok: false, kind, message };
}

export function validateEmail(email: string): ValidationResult<string> {
  if (!emailSchema.safeParse(email).success) {
    return fail('InvalidEmail', 'Invalid email address');
  }
  return { ok: true, value: email };
}

export function validateUsername(username: string): ValidationResult<string> {
  // Count code points, not UTF-16 units
  const length = Array.from(username).length;
  if (length < USERNAME_MIN_LENGTH || length > USERNAME_MAX_LENGTH) {
    return fail(
      'InvalidUsername',
      `Username must be between ${USERNAME_MIN_LENGTH} and ${USERNAME_MAX_LENGTH} characters`
    );
  }
  return { ok: true, value: username };
}

export function validatePassword(password: string): ValidationResult<string> {
  if (Array.from(password).length < PASSWORD_MIN_LENGTH) {
    return fail(
      'WeakPassword',
      `Password must be at least ${PASSWORD_MIN_LENGTH} characters long`
    );
  }
  if (!/\p{Nd}/u.test(password)) {
    return fail('WeakPassword', 'Password must contain at least one digit');
  }
  if (!/\p{Lu}/u.test(password)) {
    return fail('WeakPassword', 'Password must contain at least one uppercase letter');
  }
  return { ok: true, value: password };
}

/**
 * Checks a registration request field by field. The password is checked
 * first, then email, then username; the first failure wins.
 */
export function validateRegistration(
  input: RegistrationInput
): ValidationResult<RegistrationInput> {
  const checks = [
    validatePassword(input.password),
    validateEmail(input.email),
    validateUsername(input.username),
  ];
  for (const check of checks) {
    if (!check.ok) {
      return check;
    }
  }
  return { ok: true, value: input };
}

export function toRegistrationError(kind: ValidationErrorKind, message: string): RegistrationError {
  switch (kind) {
    case 'InvalidEmail':
      return new InvalidEmailError(message);
    case 'InvalidUsername':
      return new InvalidUsernameError(message);
    case 'WeakPassword':
      return new WeakPasswordError(message);
  }
}
