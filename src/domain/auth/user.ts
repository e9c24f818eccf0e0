/**
 * Stored user with its credential. Created once at registration and never
 * mutated afterwards.
 */
export interface UserRecord {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  /** Argon2 PHC string: algorithm, version, cost parameters, salt and digest. */
  readonly passwordHash: string;
}

/**
 * Outward representation of a user. Never carries the password hash.
 */
export interface UserView {
  readonly id: string;
  readonly name: string;
  readonly email: string;
}

export function toUserView(user: UserView): UserView {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
  };
}

/**
 * Store collaborator for user records.
 *
 * `insert` must rely on the store's own uniqueness constraint on email and
 * throw `ConflictError` when it rejects the row; every other failure is a
 * `StorageError`.
 */
export interface UserRepository {
  insert(user: UserRecord): Promise<void>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findById(id: string): Promise<UserView | null>;
  /** All users in insertion order. */
  list(): Promise<UserView[]>;
}
