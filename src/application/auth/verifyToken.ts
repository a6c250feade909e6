import type { User, UserRepository } from '../../domain/auth/user.js';
import type { TokenFailureReason } from '../../domain/auth/errors.js';
import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import { logger } from '../../infra/logger.js';

export type VerifyOutcome =
  | { ok: true; user: User }
  | { ok: false; reason: TokenFailureReason };

/**
 * Resolve a session token to the user it was issued for.
 *
 * Besides signature and expiry, the user's current email and role must still
 * equal the claims, so a token minted before a role or email change stops
 * authenticating.
 */
export class VerifyTokenUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenCodec
  ) {}

  async execute(token: string): Promise<User | null> {
    const outcome = await this.resolve(token);
    return outcome.ok ? outcome.user : null;
  }

  async resolve(token: string): Promise<VerifyOutcome> {
    const decoded = this.tokens.decode(token);
    if (!decoded.ok) {
      return this.reject(decoded.reason);
    }

    const { claims } = decoded;
    if (claims.kind !== 'session') {
      return this.reject('wrong_type', claims.sub);
    }

    const user = await this.userRepo.findById(claims.sub);
    if (!user) {
      return this.reject('unknown_subject', claims.sub);
    }

    if (user.email !== claims.email || user.role !== claims.role) {
      return this.reject('stale_claims', claims.sub);
    }

    return { ok: true, user };
  }

  private reject(reason: TokenFailureReason, userId?: number): VerifyOutcome {
    logger.debug('Session token rejected', { reason, userId });
    return { ok: false, reason };
  }
}
