/**
 * A registered account. `passwordHash` is always set before a record is
 * persisted and never leaves the service; use {@link toPublicUser} for
 * anything that is returned to a caller.
 */
export interface User {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly fullName: string | null;
  readonly passwordHash: string;
  readonly isActive: boolean;
  readonly isSuperuser: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewUser {
  username: string;
  email: string;
  fullName: string | null;
  passwordHash: string;
  isActive?: boolean;
  isSuperuser?: boolean;
}

export interface UserPatch {
  email?: string;
  fullName?: string | null;
  isActive?: boolean;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    fullName: user.fullName,
    isActive: user.isActive,
    isSuperuser: user.isSuperuser,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
