import { PasswordHasher } from '../../domain/auth/password.js';
import { UserRepo } from '../../domain/auth/userRepo.js';
import { InactiveAccountError, InvalidCredentialsError } from '../../domain/auth/errors.js';
import { logger } from '../../infra/logger.js';
import { IssuedToken, TokenCodec } from './tokenCodec.js';

export interface LoginCommand {
  /** Username or email. */
  identifier: string;
  password: string;
}

// Verified against when the identifier matches nobody, so that path costs
// the same as a wrong password.
const DUMMY_PASSWORD = 'dummy-password-for-timing';

export class LoginUseCase {
  private readonly dummyHash: Promise<string>;

  constructor(
    private userRepo: UserRepo,
    private hasher: PasswordHasher,
    private codec: TokenCodec
  ) {
    // Hashed up front so the first unknown-identifier login pays no extra hash
    this.dummyHash = hasher.hash(DUMMY_PASSWORD);
    void this.dummyHash.catch((error: unknown) => {
      logger.error('Failed to prepare the dummy password hash', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  async execute(command: LoginCommand): Promise<IssuedToken> {
    const user =
      (await this.userRepo.findByUsername(command.identifier)) ??
      (await this.userRepo.findByEmail(command.identifier));

    if (!user) {
      await this.hasher.verify(command.password, await this.dummyHash);
      logger.debug('Login failed: unknown identifier');
      throw new InvalidCredentialsError();
    }

    const isValid = await this.hasher.verify(command.password, user.passwordHash);
    if (!isValid) {
      logger.debug('Login failed: wrong password', { userId: user.id });
      throw new InvalidCredentialsError();
    }

    if (!user.isActive) {
      logger.warn('Login refused for inactive account', { userId: user.id });
      throw new InactiveAccountError();
    }

    return {
      accessToken: this.codec.issue(user.id),
      tokenType: 'bearer',
    };
  }
}
