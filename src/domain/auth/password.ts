import { argon2id, hash, verify } from 'argon2';

export interface HasherOptions {
  /** KiB of memory per hash. */
  readonly memoryCost: number;
  readonly timeCost: number;
  readonly parallelism: number;
}

export const DEFAULT_HASHER_OPTIONS: HasherOptions = Object.freeze({
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
});

/**
 * Password hashing using Argon2id. Parameters are fixed at construction;
 * build another hasher to change them.
 */
export class PasswordHasher {
  private readonly options: HasherOptions;

  constructor(options: HasherOptions = DEFAULT_HASHER_OPTIONS) {
    this.options = Object.freeze({ ...options });
  }

  /**
   * Hash a plain text password. Each call draws a fresh salt, so hashing
   * the same password twice yields two different strings.
   */
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, {
      type: argon2id,
      memoryCost: this.options.memoryCost,
      timeCost: this.options.timeCost,
      parallelism: this.options.parallelism,
    });
  }

  /**
   * Verify a plain password against a hash. A hash that is not a valid
   * Argon2 string fails closed.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
