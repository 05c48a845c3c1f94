import { PublicUser, User, UserPatch, toPublicUser } from '../../domain/auth/user.js';
import { UserRepo } from '../../domain/auth/userRepo.js';
import { DuplicateEmailError, UserNotFoundError } from '../../domain/auth/errors.js';
import { toRegistrationError, validateEmail } from '../../domain/auth/validation.js';

export interface UpdateProfileCommand {
  user: User;
  email?: string;
  fullName?: string | null;
}

/**
 * Changes the caller's own email and/or full name. Password changes are
 * not handled here.
 */
export class UpdateProfileUseCase {
  constructor(private userRepo: UserRepo) {}

  async execute(command: UpdateProfileCommand): Promise<PublicUser> {
    const patch: UserPatch = {};

    if (command.email !== undefined && command.email !== command.user.email) {
      const validation = validateEmail(command.email);
      if (!validation.ok) {
        throw toRegistrationError(validation.kind, validation.message);
      }
      const owner = await this.userRepo.findByEmail(validation.value);
      if (owner && owner.id !== command.user.id) {
        throw new DuplicateEmailError();
      }
      patch.email = validation.value;
    }

    if (command.fullName !== undefined) {
      patch.fullName = command.fullName;
    }

    if (Object.keys(patch).length === 0) {
      return toPublicUser(command.user);
    }

    const updated = await this.userRepo.update(command.user.id, patch);
    if (!updated) {
      // Deleted between the guard and this write
      throw new UserNotFoundError();
    }
    return toPublicUser(updated);
  }
}
