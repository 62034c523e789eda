import pg from 'pg';
import { User } from '../../domain/users/user.js';
import { NewUser, UserChanges, UserRepository } from '../../application/users/userRepository.js';
import { ConflictError } from '../../application/errors.js';

interface UserRow {
  id: string;
  name: string;
  email: string;
  age: number | null;
  password_hash: string;
  created_at: Date;
  updated_at: Date;
  is_deleted: boolean;
  deleted_at: Date | null;
}

const COLUMNS =
  'id, name, email, age, password_hash, created_at, updated_at, is_deleted, deleted_at';

const UNIQUE_VIOLATION = '23505';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    age: row.age,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    isDeleted: row.is_deleted,
    deletedAt: row.deleted_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof pg.DatabaseError && error.code === UNIQUE_VIOLATION;
}

/**
 * Escape LIKE wildcards so the keyword matches literally.
 */
function likePattern(keyword: string): string {
  return `%${keyword.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export class PgUserRepo implements UserRepository {
  constructor(private pool: pg.Pool) {}

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (name, email, age, password_hash)
         VALUES ($1, $2, $3, $4)
         RETURNING ${COLUMNS}`,
        [user.name, user.email, user.age, user.passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('User with this email already exists');
      }
      throw error;
    }
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE id = $1 AND NOT is_deleted`,
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByIdIncludingDeleted(id: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE lower(email) = lower($1) AND NOT is_deleted`,
      [email]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async list(): Promise<User[]> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE NOT is_deleted ORDER BY created_at, id`
    );
    return result.rows.map(toUser);
  }

  async search(keyword: string): Promise<User[]> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${COLUMNS} FROM users
       WHERE NOT is_deleted AND (name ILIKE $1 OR email ILIKE $1)
       ORDER BY created_at, id`,
      [likePattern(keyword)]
    );
    return result.rows.map(toUser);
  }

  async update(id: string, changes: UserChanges): Promise<User | null> {
    const values: unknown[] = [];
    const assignments: string[] = [];
    const set = (column: string, value: unknown) => {
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    };

    if (changes.name !== undefined) set('name', changes.name);
    if (changes.email !== undefined) set('email', changes.email);
    if (changes.age !== undefined) set('age', changes.age);
    if (changes.passwordHash !== undefined) set('password_hash', changes.passwordHash);
    assignments.push('updated_at = NOW()');

    values.push(id);

    try {
      const result = await this.pool.query<UserRow>(
        `UPDATE users SET ${assignments.join(', ')}
         WHERE id = $${values.length} AND NOT is_deleted
         RETURNING ${COLUMNS}`,
        values
      );
      return result.rows.length === 0 ? null : toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('User with this email already exists');
      }
      throw error;
    }
  }

  async softDelete(id: string): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE users
       SET is_deleted = TRUE, deleted_at = NOW(), updated_at = NOW()
       WHERE id = $1 AND NOT is_deleted`,
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async restore(id: string): Promise<User | null> {
    try {
      const result = await this.pool.query<UserRow>(
        `UPDATE users
         SET is_deleted = FALSE, deleted_at = NULL, updated_at = NOW()
         WHERE id = $1 AND is_deleted
         RETURNING ${COLUMNS}`,
        [id]
      );
      return result.rows.length === 0 ? null : toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Email address is now used by another user');
      }
      throw error;
    }
  }

  async hardDelete(id: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM users WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
