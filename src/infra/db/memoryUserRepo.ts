import { NewUser, User, UserPatch } from '../../domain/auth/user.js';
import { UserRepo } from '../../domain/auth/userRepo.js';
import { DuplicateEmailError, DuplicateUsernameError } from '../../domain/auth/errors.js';

/**
 * Process-local user store with the same uniqueness rules as the `users`
 * table. Every check-and-write runs without an await in between, so two
 * concurrent registrations for one email cannot both succeed.
 */
export class MemoryUserRepo implements UserRepo {
  private users = new Map<number, User>();
  private nextId = 1;

  constructor(private clock: () => Date = () => new Date()) {}

  async findById(id: number): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.find((user) => user.username === username);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.find((user) => user.email === email);
  }

  async create(input: NewUser): Promise<User> {
    this.assertUnique(input.email, input.username);

    const now = this.clock();
    const user: User = {
      id: this.nextId++,
      username: input.username,
      email: input.email,
      fullName: input.fullName,
      passwordHash: input.passwordHash,
      isActive: input.isActive ?? true,
      isSuperuser: input.isSuperuser ?? false,
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(user.id, user);
    return user;
  }

  async update(id: number, patch: UserPatch): Promise<User | null> {
    const current = this.users.get(id);
    if (!current) {
      return null;
    }
    if (patch.email !== undefined) {
      this.assertUnique(patch.email, undefined, id);
    }

    const updated: User = {
      ...current,
      email: patch.email ?? current.email,
      fullName: patch.fullName !== undefined ? patch.fullName : current.fullName,
      isActive: patch.isActive ?? current.isActive,
      updatedAt: this.clock(),
    };
    this.users.set(id, updated);
    return updated;
  }

  async ping(): Promise<void> {}

  /** Removes a user outright; there is no HTTP route for this. */
  async delete(id: number): Promise<boolean> {
    return this.users.delete(id);
  }

  private find(predicate: (user: User) => boolean): User | null {
    for (const user of this.users.values()) {
      if (predicate(user)) {
        return user;
      }
    }
    return null;
  }

  private assertUnique(email: string, username: string | undefined, exceptId?: number): void {
    const others = [...this.users.values()].filter((user) => user.id !== exceptId);
    if (others.some((user) => user.email === email)) {
      throw new DuplicateEmailError();
    }
    if (username !== undefined && others.some((user) => user.username === username)) {
      throw new DuplicateUsernameError();
    }
  }
}
