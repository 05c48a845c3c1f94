import { User } from '../../domain/auth/user.js';
import { IssuedToken, TokenCodec } from './tokenCodec.js';

/**
 * Issues a fresh token for a user the guard has already resolved.
 */
export class RefreshTokenUseCase {
  constructor(private codec: TokenCodec) {}

  execute(user: User): IssuedToken {
    return {
      accessToken: this.codec.issue(user.id),
      tokenType: 'bearer',
    };
  }
}
