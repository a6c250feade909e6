import { randomUUID } from 'crypto';
import { InvalidTokenError } from '../../domain/auth/errors.js';
import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import type { AuthConfig } from './config.js';
import { issueSessionToken } from './sessionToken.js';
import type { VerifyTokenUseCase } from './verifyToken.js';

export class RefreshTokenUseCase {
  constructor(
    private verifyToken: VerifyTokenUseCase,
    private tokens: TokenCodec,
    private config: AuthConfig
  ) {}

  async execute(token: string): Promise<string> {
    const outcome = await this.verifyToken.resolve(token);
    if (!outcome.ok) {
      throw new InvalidTokenError(outcome.reason);
    }

    // jti keeps the new token distinct even within the same second
    return issueSessionToken(this.tokens, this.config, outcome.user, randomUUID());
  }
}
