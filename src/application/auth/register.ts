import { PasswordHasher } from '../../domain/auth/password.js';
import { PublicUser, toPublicUser } from '../../domain/auth/user.js';
import { UserRepo } from '../../domain/auth/userRepo.js';
import { DuplicateEmailError, DuplicateUsernameError } from '../../domain/auth/errors.js';
import { toRegistrationError, validateRegistration } from '../../domain/auth/validation.js';
import { logger } from '../../infra/logger.js';

export interface RegisterCommand {
  email: string;
  username: string;
  fullName?: string | null;
  password: string;
}

export class RegisterUseCase {
  constructor(
    private userRepo: UserRepo,
    private hasher: PasswordHasher
  ) {}

  async execute(command: RegisterCommand): Promise<PublicUser> {
    const validation = validateRegistration({
      email: command.email,
      username: command.username,
      fullName: command.fullName ?? null,
      password: command.password,
    });
    if (!validation.ok) {
      throw toRegistrationError(validation.kind, validation.message);
    }
    const input = validation.value;

    // Fast path only; the store's unique constraints settle concurrent registrations
    if (await this.userRepo.findByEmail(input.email)) {
      throw new DuplicateEmailError();
    }
    if (await this.userRepo.findByUsername(input.username)) {
      throw new DuplicateUsernameError();
    }

    const passwordHash = await this.hasher.hash(input.password);

    const user = await this.userRepo.create({
      email: input.email,
      username: input.username,
      fullName: input.fullName,
      passwordHash,
      isActive: true,
      isSuperuser: false,
    });

    logger.info('User registered', { userId: user.id });
    return toPublicUser(user);
  }
}
