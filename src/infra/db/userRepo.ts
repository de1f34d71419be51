import { pool } from './pool.js';
import { isUuid } from './uuid.js';
import { NewUser, Role, User } from '../../domain/auth/user.js';
import { ValidationError } from '../../application/errors.js';
import { UserRepository } from '../../application/repositories.js';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  role: Role;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = 'id, username, email, password_hash, role, created_at, updated_at';

const UNIQUE_VIOLATION = '23505';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(error: unknown): error is { code: string; constraint?: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

export class PgUserRepo implements UserRepository {
  async findById(id: string): Promise<User | null> {
    if (!isUuid(id)) {
      return null;
    }
    const result = await pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [
      id,
    ]);
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [
      email,
    ]);
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async create(newUser: NewUser): Promise<User> {
    try {
      const result = await pool.query<UserRow>(
        `INSERT INTO users (username, email, password_hash, role)
         VALUES ($1, $2, $3, $4)
         RETURNING ${USER_COLUMNS}`,
        [newUser.username, newUser.email, newUser.passwordHash, newUser.role]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      // A concurrent registration can still win the race past the use case check
      if (isUniqueViolation(error)) {
        const field = error.constraint === 'users_email_key' ? 'email' : 'username';
        throw new ValidationError([{ path: field, message: `A user with this ${field} already exists` }]);
      }
      throw error;
    }
  }
}
