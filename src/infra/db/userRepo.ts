import type { Pool } from 'pg';
import { pool as defaultPool } from './pool.js';
import {
  isRole,
  NewUser,
  normalizeEmail,
  User,
  UserRepository,
} from '../../domain/auth/user.js';
import { DuplicateEmailError } from '../../domain/auth/errors.js';

type UserRow = {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  password_hash: string;
  role: string;
  created_at: Date;
};

const USER_COLUMNS = 'id, first_name, last_name, email, password_hash, role, created_at';

const UNIQUE_VIOLATION = '23505';

function toUser(row: UserRow): User {
  if (!isRole(row.role)) {
    throw new Error(`Unknown role '${row.role}' for user ${row.id}`);
  }
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

export class UserRepo implements UserRepository {
  constructor(private db: Pool = defaultPool) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE lower(email) = $1`,
      [normalizeEmail(email)]
    );

    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );

    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.db.query<UserRow>(
        `INSERT INTO users (first_name, last_name, email, password_hash, role)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${USER_COLUMNS}`,
        [user.firstName, user.lastName, normalizeEmail(user.email), user.passwordHash, user.role]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError();
      }
      throw error;
    }
  }

  async updatePasswordHash(id: number, passwordHash: string): Promise<boolean> {
    const result = await this.db.query(
      'UPDATE users SET password_hash = $1 WHERE id = $2',
      [passwordHash, id]
    );
    return (result.rowCount ?? 0) > 0;
  }
}
