import { argon2id, hash, verify } from 'argon2';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import { ConfigurationError } from '../../application/errors.js';

/**
 * Argon2id cost parameters. The encoded hash embeds them, so verification
 * never needs this object.
 */
export interface HashParams {
  /** KiB of memory per hash. */
  memoryCost: number;
  /** Passes over memory. */
  timeCost: number;
  parallelism: number;
  /** Bytes of random salt per hash. */
  saltLength: number;
  /** Bytes of digest. */
  hashLength: number;
}

/**
 * Production parameters: 19 MiB, 2 passes, 1 lane (OWASP minimum for
 * Argon2id), 16-byte salt, 32-byte digest.
 */
export const ARGON2_PARAMS: Readonly<HashParams> = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
  saltLength: 16,
  hashLength: 32,
};

const hashParamsSchema = z
  .object({
    memoryCost: z.number().int().min(1024),
    timeCost: z.number().int().min(2),
    parallelism: z.number().int().min(1).max(255),
    saltLength: z.number().int().min(8).max(64),
    hashLength: z.number().int().min(16).max(64),
  })
  .refine((p) => p.memoryCost >= 8 * p.parallelism, {
    message: 'memoryCost must be at least 8 KiB per lane',
    path: ['memoryCost'],
  });

// $argon2id$v=19$m=19456,t=2,p=1$<salt>$<digest>, base64 without padding
const PHC_ARGON2 =
  /^\$argon2(?:id|i|d)\$v=\d+\$m=\d+,t=\d+,p=\d+\$[A-Za-z0-9+/]+\$[A-Za-z0-9+/]+$/;

/**
 * The stored hash could not be decoded. Signals a corrupt row, never a
 * wrong password.
 */
export class MalformedHashError extends Error {
  constructor(options?: { cause?: unknown }) {
    super('Stored password hash is malformed', options);
    this.name = 'MalformedHashError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Password hashing using Argon2id.
 *
 * The native add-on derives keys on the libuv thread pool, so a slow hash
 * does not stall request dispatch on the event loop.
 */
export class PasswordHasher {
  private readonly params: HashParams;

  constructor(params: HashParams = ARGON2_PARAMS) {
    const parsed = hashParamsSchema.safeParse(params);
    if (!parsed.success) {
      const detail = parsed.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid password hashing parameters (${detail})`);
    }
    this.params = parsed.data;
  }

  /**
   * Hash a plain text password with a fresh random salt.
   * Returns the PHC-encoded string to store.
   */
  async hash(plainPassword: string): Promise<string> {
    const salt = randomBytes(this.params.saltLength);
    try {
      return await hash(plainPassword, {
        type: argon2id,
        memoryCost: this.params.memoryCost,
        timeCost: this.params.timeCost,
        parallelism: this.params.parallelism,
        hashLength: this.params.hashLength,
        salt,
      });
    } catch (error) {
      throw new ConfigurationError('Password hashing failed', { cause: error });
    }
  }

  /**
   * Verify a plain password against a stored hash, using the parameters and
   * salt embedded in it. The digest comparison is constant-time.
   */
  async verify(plainPassword: string, encodedHash: string): Promise<boolean> {
    if (!PHC_ARGON2.test(encodedHash)) {
      throw new MalformedHashError();
    }
    try {
      return await verify(encodedHash, plainPassword);
    } catch (error) {
      throw new MalformedHashError({ cause: error });
    }
  }

  /**
   * Hash and verify a throwaway secret. Run once at startup so bad
   * parameters stop the process before it takes traffic.
   */
  async selfTest(): Promise<void> {
    const probe = randomBytes(16).toString('base64url');
    const encoded = await this.hash(probe);
    if (!(await this.verify(probe, encoded))) {
      throw new ConfigurationError('Password hasher self-test failed');
    }
  }
}
