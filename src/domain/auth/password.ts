import { hash, verify } from 'argon2';
import { createHash } from 'crypto';

/**
 * Password hashing using Argon2 (argon2id, library defaults).
 * The returned PHC string carries the parameters and salt.
 */
export class Password {
  static async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword);
  }

  /**
   * Verify a plain password against a hash. Malformed hashes verify as false.
   */
  static async verify(plainPassword: string, hash: string): Promise<boolean> {
    if (!hash) {
      return false;
    }
    try {
      return await verify(hash, plainPassword);
    } catch {
      return false;
    }
  }

  /**
   * Short, stable digest of a stored hash. Reset tokens embed it so they stop
   * verifying once the password changes.
   */
  static fingerprint(passwordHash: string): string {
    return createHash('sha256').update(passwordHash).digest('base64url').slice(0, 16);
  }
}
