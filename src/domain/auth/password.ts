import { argon2id, hash, verify } from 'argon2';

export interface PasswordHashingOptions {
  /** Number of passes over memory. */
  timeCost: number;
  /** Memory usage in KiB. */
  memoryCost: number;
}

/**
 * Password hashing using Argon2id (salted, adaptive).
 */
export class PasswordHasher {
  constructor(private readonly options: PasswordHashingOptions) {}

  /**
   * Hash a plain text password. A random salt is generated per call.
   */
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, {
      type: argon2id,
      timeCost: this.options.timeCost,
      memoryCost: this.options.memoryCost,
    });
  }

  /**
   * Verify a plain password against a hash. Malformed hashes do not verify.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      return false;
    }
  }
}
