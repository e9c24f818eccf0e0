import { randomUUID } from 'crypto';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { UserRecord, UserRepository } from '../../domain/auth/user.js';
import { validateRegistration } from '../../domain/auth/validation.js';
import type { Logger } from '../../infra/logger.js';
import { ValidationError } from '../errors.js';

export interface RegisterResult {
  userId: string;
  email: string;
}

export class RegisterUseCase {
  constructor(
    private userRepo: UserRepository,
    private hasher: PasswordHasher,
    private logger: Logger
  ) {}

  /**
   * Validate, hash and store a new user.
   *
   * There is no lookup before the insert: the store's unique index decides
   * duplicates, and the repository reports them as ConflictError.
   */
  async execute(input: unknown): Promise<RegisterResult> {
    const validation = validateRegistration(input);
    if (!validation.ok) {
      throw new ValidationError(validation.issues);
    }

    const { name, email, password } = validation.value;
    const user: UserRecord = {
      id: randomUUID(),
      name,
      email,
      passwordHash: await this.hasher.hash(password),
    };

    await this.userRepo.insert(user);
    this.logger.info('User registered', { userId: user.id });

    return {
      userId: user.id,
      email: user.email,
    };
  }
}
