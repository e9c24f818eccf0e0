import pg from 'pg';
import type { Pool, QueryResult, QueryResultRow } from 'pg';
import { ConflictError, StorageError } from '../../application/errors.js';
import type { UserRecord, UserRepository, UserView } from '../../domain/auth/user.js';

/** Unique index on LOWER(email), created by 001_create_users.sql. */
export const EMAIL_UNIQUE_CONSTRAINT = 'users_email_lower_key';

const UNIQUE_VIOLATION = '23505';

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

interface UserRow {
  id: string;
  name: string;
  email: string;
  password_hash: string;
}

type UserViewRow = Omit<UserRow, 'password_hash'>;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Translate a failed insert. Only the store's rejection on the email index
 * counts as a conflict; anything else, primary key collisions included, is a
 * storage failure.
 */
export function mapInsertError(error: unknown): Error {
  if (
    error instanceof pg.DatabaseError &&
    error.code === UNIQUE_VIOLATION &&
    error.constraint === EMAIL_UNIQUE_CONSTRAINT
  ) {
    return new ConflictError('User with this email already exists');
  }
  return new StorageError('Failed to insert user', { cause: error });
}

export class PgUserRepo implements UserRepository {
  constructor(private pool: Pool) {}

  async insert(user: UserRecord): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO users (id, name, email, password_hash)
         VALUES ($1, $2, $3, $4)`,
        [user.id, user.name, user.email, user.passwordHash]
      );
    } catch (error) {
      throw mapInsertError(error);
    }
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const result = await this.run<UserRow>(
      'find user by email',
      'SELECT id, name, email, password_hash FROM users WHERE LOWER(email) = LOWER($1)',
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }

    const row = result.rows[0];
    return {
      id: row.id,
      name: row.name,
      email: row.email,
      passwordHash: row.password_hash,
    };
  }

  async findById(id: string): Promise<UserView | null> {
    // The column is UUID-typed; anything else cannot match.
    if (!isUuid(id)) {
      return null;
    }

    const result = await this.run<UserViewRow>(
      'find user by id',
      'SELECT id, name, email FROM users WHERE id = $1',
      [id]
    );

    return result.rows[0] ?? null;
  }

  async list(): Promise<UserView[]> {
    const result = await this.run<UserViewRow>(
      'list users',
      'SELECT id, name, email FROM users ORDER BY seq ASC'
    );
    return result.rows;
  }

  private async run<R extends QueryResultRow>(
    operation: string,
    text: string,
    values: unknown[] = []
  ): Promise<QueryResult<R>> {
    try {
      return await this.pool.query<R>(text, values);
    } catch (error) {
      throw new StorageError(`Failed to ${operation}`, { cause: error });
    }
  }
}
