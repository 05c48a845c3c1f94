import { PublicUser, User, toPublicUser } from '../../domain/auth/user.js';
import { UserRepo } from '../../domain/auth/userRepo.js';
import { NotFoundError } from '../errors.js';
import { logger } from '../../infra/logger.js';
import { AuthGuard } from './guard.js';

export interface SetUserActiveCommand {
  actor: User;
  userId: number;
  isActive: boolean;
}

/**
 * Superuser-only switch of an account's active flag. Deactivating an
 * account immediately invalidates every token issued to it.
 */
export class SetUserActiveUseCase {
  constructor(
    private userRepo: UserRepo,
    private guard: AuthGuard
  ) {}

  async execute(command: SetUserActiveCommand): Promise<PublicUser> {
    this.guard.requireSuperuser(command.actor);

    const updated = await this.userRepo.update(command.userId, { isActive: command.isActive });
    if (!updated) {
      throw new NotFoundError('User not found');
    }

    logger.info('User active flag changed', {
      userId: updated.id,
      isActive: updated.isActive,
      actorId: command.actor.id,
    });
    return toPublicUser(updated);
  }
}
