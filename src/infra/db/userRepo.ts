import type { DbPool } from './pool.js';
import { isUniqueViolation } from './pool.js';
import { isRole, type User } from '../../domain/auth/user.js';
import type { NewUser, UserRepository } from '../../application/ports.js';
import { DuplicateUsernameError } from '../../application/errors.js';

interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  role: string;
  is_primary: boolean;
  token_version: number;
  created_at: Date;
}

const USER_COLUMNS = 'id, username, password_hash, role, is_primary, token_version, created_at';

function toUser(row: UserRow): User {
  if (!isRole(row.role)) {
    throw new Error(`Unknown role "${row.role}" stored for user ${row.id}`);
  }
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    role: row.role,
    isPrimary: row.is_primary,
    tokenVersion: row.token_version,
    createdAt: row.created_at,
  };
}

export class UserRepo implements UserRepository {
  constructor(private pool: DbPool) {}

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [
      id,
    ]);
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findPrimary(): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE is_primary LIMIT 1`
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async list(): Promise<User[]> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users ORDER BY id`);
    return result.rows.map(toUser);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (username, password_hash, role, is_primary)
         VALUES ($1, $2, $3, $4)
         RETURNING ${USER_COLUMNS}`,
        [user.username, user.passwordHash, user.role, user.isPrimary]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error, 'users_username_key')) {
        throw new DuplicateUsernameError(user.username);
      }
      throw error;
    }
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM users WHERE id = $1 AND NOT is_primary', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async incrementTokenVersion(id: number): Promise<void> {
    await this.pool.query('UPDATE users SET token_version = token_version + 1 WHERE id = $1', [id]);
  }
}
