import { randomBytes } from 'crypto';
import { MalformedHashError, type PasswordHasher } from '../../domain/auth/password.js';
import type { UserRepository } from '../../domain/auth/user.js';
import { validateLogin } from '../../domain/auth/validation.js';
import type { Logger } from '../../infra/logger.js';
import { InvalidCredentialsError, ValidationError } from '../errors.js';

export interface LoginResult {
  userId: string;
}

export class LoginUseCase {
  private decoyHash?: Promise<string>;

  constructor(
    private userRepo: UserRepository,
    private hasher: PasswordHasher,
    private logger: Logger
  ) {}

  /**
   * Check an email/password pair.
   *
   * Unknown email, wrong password and an undecodable stored hash all end in
   * the same InvalidCredentialsError; only the logs tell them apart.
   */
  async execute(input: unknown): Promise<LoginResult> {
    const validation = validateLogin(input);
    if (!validation.ok) {
      throw new ValidationError(validation.issues);
    }

    const { email, password } = validation.value;
    const user = await this.userRepo.findByEmail(email);

    if (!user) {
      // Spend the same hashing time as a real check.
      await this.hasher.verify(password, await this.getDecoyHash());
      this.logger.debug('Login rejected', { reason: 'unknown_email' });
      throw new InvalidCredentialsError();
    }

    let isValid: boolean;
    try {
      isValid = await this.hasher.verify(password, user.passwordHash);
    } catch (error) {
      if (error instanceof MalformedHashError) {
        this.logger.error(error, { userId: user.id, reason: 'malformed_hash' });
        throw new InvalidCredentialsError();
      }
      throw error;
    }

    if (!isValid) {
      this.logger.debug('Login rejected', { userId: user.id, reason: 'wrong_password' });
      throw new InvalidCredentialsError();
    }

    this.logger.info('Login succeeded', { userId: user.id });
    return { userId: user.id };
  }

  private async getDecoyHash(): Promise<string> {
    this.decoyHash ??= this.hasher.hash(randomBytes(16).toString('base64url'));
    try {
      return await this.decoyHash;
    } catch (error) {
      this.decoyHash = undefined;
      throw error;
    }
  }
}
