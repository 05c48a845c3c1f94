import { DbPool } from './pool.js';
import { NewUser, User, UserPatch } from '../../domain/auth/user.js';
import { UserRepo } from '../../domain/auth/userRepo.js';
import { DuplicateEmailError, DuplicateUsernameError } from '../../domain/auth/errors.js';

const USER_COLUMNS =
  'id, username, email, full_name, hashed_password, is_active, is_superuser, created_at, updated_at';

interface UserRow {
  id: number;
  username: string;
  email: string;
  full_name: string | null;
  hashed_password: string;
  is_active: boolean;
  is_superuser: boolean;
  created_at: Date;
  updated_at: Date;
}

const UNIQUE_VIOLATION = '23505';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    fullName: row.full_name,
    passwordHash: row.hashed_password,
    isActive: row.is_active,
    isSuperuser: row.is_superuser,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Translate a unique-constraint violation on `users` into the matching
 * domain error; anything else is returned untouched.
 */
function mapUniqueViolation(error: unknown): unknown {
  if (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION &&
    'constraint' in error
  ) {
    if (error.constraint === 'users_email_key') {
      return new DuplicateEmailError();
    }
    if (error.constraint === 'users_username_key') {
      return new DuplicateUsernameError();
    }
  }
  return error;
}

export class PgUserRepo implements UserRepo {
  constructor(private pool: DbPool) {}

  async findById(id: number): Promise<User | null> {
    return this.findOne('id', id);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOne('username', username);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOne('email', email);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (username, email, full_name, hashed_password, is_active, is_superuser)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${USER_COLUMNS}`,
        [
          user.username,
          user.email,
          user.fullName,
          user.passwordHash,
          user.isActive ?? true,
          user.isSuperuser ?? false,
        ]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      throw mapUniqueViolation(error);
    }
  }

  async update(id: number, patch: UserPatch): Promise<User | null> {
    const assignments: string[] = [];
    const values: unknown[] = [id];

    const set = (column: string, value: unknown) => {
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    };

    if (patch.email !== undefined) set('email', patch.email);
    if (patch.fullName !== undefined) set('full_name', patch.fullName);
    if (patch.isActive !== undefined) set('is_active', patch.isActive);
    assignments.push('updated_at = NOW()');

    try {
      const result = await this.pool.query<UserRow>(
        `UPDATE users SET ${assignments.join(', ')}
         WHERE id = $1
         RETURNING ${USER_COLUMNS}`,
        values
      );
      return result.rows.length === 0 ? null : toUser(result.rows[0]);
    } catch (error) {
      throw mapUniqueViolation(error);
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  private async findOne(
    column: 'id' | 'username' | 'email',
    value: number | string
  ): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = $1`,
      [value]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }
}
