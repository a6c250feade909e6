import { Password } from '../../domain/auth/password.js';
import { normalizeEmail, UserRepository } from '../../domain/auth/user.js';
import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import { RESET_TOKEN_TTL_SECONDS } from './config.js';

export class RequestPasswordResetUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenCodec
  ) {}

  /**
   * Returns null for an unknown email. Callers must not let that difference
   * reach the client.
   */
  async execute(email: string): Promise<string | null> {
    const user = await this.userRepo.findByEmail(normalizeEmail(email));
    if (!user) {
      return null;
    }

    return this.tokens.encode(
      {
        kind: 'reset',
        sub: user.id,
        email: user.email,
        pwd: Password.fingerprint(user.passwordHash),
      },
      RESET_TOKEN_TTL_SECONDS
    );
  }
}
