import { describe, it, expect, beforeEach } from 'vitest';
import { RegisterUseCase } from '../register.js';
import { PasswordHasher } from '../../../domain/auth/password.js';
import { MemoryUserRepo } from '../../../infra/db/memoryUserRepo.js';
import {
  DuplicateEmailError,
  DuplicateUsernameError,
  InvalidEmailError,
  InvalidUsernameError,
  WeakPasswordError,
} from '../../../domain/auth/errors.js';
import { FAST_HASHER_OPTIONS, fakeClock } from '../../../__tests__/fixtures.js';

describe('RegisterUseCase', () => {
  let userRepo: MemoryUserRepo;
  let hasher: PasswordHasher;
  let useCase: RegisterUseCase;

  beforeEach(() => {
    userRepo = new MemoryUserRepo(fakeClock().now);
    hasher = new PasswordHasher(FAST_HASHER_OPTIONS);
    useCase = new RegisterUseCase(userRepo, hasher);
  });

  it('should create an active, non-superuser account', async () => {
    const user = await useCase.execute({
      email: 'alice@example.com',
      username: 'alice',
      fullName: 'Alice Example',
      password: 'Valid123',
    });

    expect(user).toEqual({
      id: 1,
      email: 'alice@example.com',
      username: 'alice',
      fullName: 'Alice Example',
      isActive: true,
      isSuperuser: false,
      createdAt: new Date('2030-01-01T00:00:00.000Z'),
      updatedAt: new Date('2030-01-01T00:00:00.000Z'),
    });
  });

  it('should not expose the password hash', async () => {
    const user = await useCase.execute({
      email: 'alice@example.com',
      username: 'alice',
      password: 'Valid123',
    });

    expect(user).not.toHaveProperty('passwordHash');
  });

  it('should store a hash that verifies the password', async () => {
    await useCase.execute({ email: 'alice@example.com', username: 'alice', password: 'Valid123' });

    const stored = await userRepo.findByUsername('alice');
    expect(stored?.passwordHash).not.toBe('Valid123');
    expect(await hasher.verify('Valid123', stored?.passwordHash ?? '')).toBe(true);
  });

  it('should default the full name to null', async () => {
    const user = await useCase.execute({
      email: 'alice@example.com',
      username: 'alice',
      password: 'Valid123',
    });

    expect(user.fullName).toBeNull();
  });

  it('should reject a duplicate email', async () => {
    await useCase.execute({ email: 'alice@example.com', username: 'alice', password: 'Valid123' });

    await expect(
      useCase.execute({ email: 'alice@example.com', username: 'alice2', password: 'Valid123' })
    ).rejects.toThrow(DuplicateEmailError);
  });

  it('should reject a duplicate username', async () => {
    await useCase.execute({ email: 'alice@example.com', username: 'alice', password: 'Valid123' });

    await expect(
      useCase.execute({ email: 'other@example.com', username: 'alice', password: 'Valid123' })
    ).rejects.toThrow(DuplicateUsernameError);
  });

  it('should report the email first when both are taken', async () => {
    await useCase.execute({ email: 'alice@example.com', username: 'alice', password: 'Valid123' });

    await expect(
      useCase.execute({ email: 'alice@example.com', username: 'alice', password: 'Valid123' })
    ).rejects.toThrow(DuplicateEmailError);
  });

  it('should let exactly one of two concurrent registrations win', async () => {
    const results = await Promise.allSettled([
      useCase.execute({ email: 'race@example.com', username: 'racer1', password: 'Valid123' }),
      useCase.execute({ email: 'race@example.com', username: 'racer2', password: 'Valid123' }),
    ]);

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter(
      (r): r is PromiseRejectedResult => r.status === 'rejected'
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(DuplicateEmailError);
  });

  describe('password strength', () => {
    it.each([
      ['short', 'Password must be at least 8 characters long'],
      ['alllowercase1', 'Password must contain at least one uppercase letter'],
      ['NoDigitsHere', 'Password must contain at least one digit'],
    ])('should reject %s', async (password, message) => {
      await expect(
        useCase.execute({ email: 'a@b.com', username: 'ab', password })
      ).rejects.toThrow(new WeakPasswordError(message));
    });

    it('should accept Valid123', async () => {
      const user = await useCase.execute({
        email: 'a@b.com',
        username: 'abc',
        password: 'Valid123',
      });

      expect(user.username).toBe('abc');
    });
  });

  it('should reject an invalid email', async () => {
    await expect(
      useCase.execute({ email: 'invalid-email', username: 'alice', password: 'Valid123' })
    ).rejects.toThrow(InvalidEmailError);
  });

  it('should reject a username outside 3 to 50 characters', async () => {
    await expect(
      useCase.execute({ email: 'a@b.com', username: 'ab', password: 'Valid123' })
    ).rejects.toThrow(InvalidUsernameError);
    await expect(
      useCase.execute({ email: 'a@b.com', username: 'x'.repeat(51), password: 'Valid123' })
    ).rejects.toThrow(InvalidUsernameError);
  });

  it('should not persist anything when validation fails', async () => {
    await expect(
      useCase.execute({ email: 'a@b.com', username: 'alice', password: 'short' })
    ).rejects.toThrow(WeakPasswordError);

    expect(await userRepo.findByUsername('alice')).toBeNull();
  });
});
