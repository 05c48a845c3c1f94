import { User } from '../../domain/auth/user.js';
import { UserRepo } from '../../domain/auth/userRepo.js';
import {
  InactiveAccountError,
  InvalidTokenError,
  MalformedTokenError,
  UserNotFoundError,
} from '../../domain/auth/errors.js';
import { ForbiddenError } from '../errors.js';
import { logger } from '../../infra/logger.js';
import { TokenCodec } from './tokenCodec.js';

/**
 * Turns a bearer token into the active user it was issued to.
 *
 * There is no revocation list: a token stops working when it expires or
 * when its user is deactivated or deleted.
 */
export class AuthGuard {
  constructor(
    private codec: TokenCodec,
    private userRepo: UserRepo
  ) {}

  async resolve(token: string): Promise<User> {
    const userId = this.subjectOf(token);

    const user = await this.userRepo.findById(userId);
    if (!user) {
      logger.warn('Token subject does not resolve to a user', { userId });
      throw new UserNotFoundError();
    }

    if (!user.isActive) {
      logger.warn('Token presented for inactive account', { userId });
      throw new InactiveAccountError();
    }

    return user;
  }

  requireSuperuser(user: User): void {
    if (!user.isSuperuser) {
      throw new ForbiddenError();
    }
  }

  private subjectOf(token: string): number {
    try {
      const payload = this.codec.decode(token);
      if (!/^[1-9]\d*$/.test(payload.sub)) {
        throw new MalformedTokenError(`Subject is not a user id: ${payload.sub}`);
      }
      const userId = Number(payload.sub);
      if (!Number.isSafeInteger(userId)) {
        throw new MalformedTokenError(`Subject is not a user id: ${payload.sub}`);
      }
      return userId;
    } catch (error) {
      if (error instanceof InvalidTokenError) {
        logger.warn('Token rejected', { reason: error.reason, detail: error.detail });
      }
      throw error;
    }
  }
}
