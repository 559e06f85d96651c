import type { NewUser, User, UserRepository } from '../../domain/auth/user.js';
import { ConflictError } from '../../application/errors.js';
import { isUniqueViolation, type DbPool } from './pool.js';

type UserRow = {
  id: number;
  email: string;
  username: string;
  hashed_password: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
};

const USER_COLUMNS = 'id, email, username, hashed_password, is_active, created_at, updated_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    passwordHash: row.hashed_password,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class UserRepo implements UserRepository {
  constructor(private pool: DbPool) {}

  async findById(id: number): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (email, username, hashed_password)
         VALUES ($1, $2, $3)
         RETURNING ${USER_COLUMNS}`,
        [user.email, user.username, user.passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      // A concurrent registration can slip past the use case's lookups
      if (isUniqueViolation(error)) {
        throw new ConflictError(
          error.constraint === 'users_username_key'
            ? 'Username already taken'
            : 'Email already registered'
        );
      }
      throw error;
    }
  }

  async setActive(id: number, isActive: boolean): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `UPDATE users SET is_active = $2, updated_at = NOW()
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [id, isActive]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async delete(id: number): Promise<boolean> {
    // todos.user_id is ON DELETE CASCADE
    const result = await this.pool.query('DELETE FROM users WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
