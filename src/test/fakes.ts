import { vi } from 'vitest';
import { ConflictError, StorageError } from '../application/errors.js';
import type { HashParams } from '../domain/auth/password.js';
import type { UserRecord, UserRepository, UserView } from '../domain/auth/user.js';
import type { LogFields, Logger } from '../infra/logger.js';

/** Cheapest parameters the hasher accepts; keeps unit tests fast. */
export const FAST_HASH_PARAMS: HashParams = {
  memoryCost: 1024,
  timeCost: 2,
  parallelism: 1,
  saltLength: 16,
  hashLength: 32,
};

/**
 * In-process stand-in for PgUserRepo. Email uniqueness is case-insensitive
 * like the store's LOWER(email) index, and the check and the write happen in
 * the same synchronous step, so concurrent inserts race the way they do
 * against the database.
 */
export class InMemoryUserRepo implements UserRepository {
  private readonly users = new Map<string, UserRecord>();

  /** When set, every call rejects with this error. */
  failWith?: Error;

  async insert(user: UserRecord): Promise<void> {
    this.throwIfFailing();
    const email = user.email.toLowerCase();
    for (const existing of this.users.values()) {
      if (existing.email.toLowerCase() === email) {
        throw new ConflictError('User with this email already exists');
      }
    }
    if (this.users.has(user.id)) {
      throw new StorageError('Failed to insert user');
    }
    this.users.set(user.id, user);
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    this.throwIfFailing();
    const wanted = email.toLowerCase();
    for (const user of this.users.values()) {
      if (user.email.toLowerCase() === wanted) {
        return user;
      }
    }
    return null;
  }

  async findById(id: string): Promise<UserView | null> {
    this.throwIfFailing();
    return this.users.get(id) ?? null;
  }

  async list(): Promise<UserView[]> {
    this.throwIfFailing();
    return [...this.users.values()];
  }

  get size(): number {
    return this.users.size;
  }

  private throwIfFailing(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

export function createTestLogger() {
  const logger = {
    info: vi.fn<(msg: string, fields?: LogFields) => void>(),
    warn: vi.fn<(msg: string, fields?: LogFields) => void>(),
    error: vi.fn<(msg: string | Error, fields?: LogFields) => void>(),
    debug: vi.fn<(msg: string, fields?: LogFields) => void>(),
    child: vi.fn<(bindings: LogFields) => Logger>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}
