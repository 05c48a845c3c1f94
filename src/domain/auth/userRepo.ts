import { NewUser, User, UserPatch } from './user.js';

/**
 * Durable user store. Implementations must enforce email and username
 * uniqueness atomically and raise DuplicateEmailError / DuplicateUsernameError
 * from `create` and `update` when a write would break it.
 */
export interface UserRepo {
  findById(id: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
  /** Applies the patch and bumps `updatedAt`. Resolves to null for an unknown id. */
  update(id: number, patch: UserPatch): Promise<User | null>;
  /** Cheap round trip used by the health endpoint. */
  ping(): Promise<void>;
}
