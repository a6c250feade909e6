import { Password } from '../../domain/auth/password.js';
import type { UserRepository } from '../../domain/auth/user.js';
import { InvalidResetTokenError } from '../../domain/auth/errors.js';
import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import { logger } from '../../infra/logger.js';

export interface ResetPasswordCommand {
  token: string;
  newPassword: string;
}

export class ResetPasswordUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenCodec
  ) {}

  async execute(command: ResetPasswordCommand): Promise<boolean> {
    const decoded = this.tokens.decode(command.token);
    if (!decoded.ok) {
      throw new InvalidResetTokenError(decoded.reason);
    }

    const { claims } = decoded;
    if (claims.kind !== 'reset') {
      throw new InvalidResetTokenError('wrong_type');
    }

    const user = await this.userRepo.findById(claims.sub);
    if (!user) {
      throw new InvalidResetTokenError('unknown_subject');
    }

    // A changed fingerprint means the token was already used or the password
    // moved on since it was issued.
    if (
      user.email !== claims.email ||
      Password.fingerprint(user.passwordHash) !== claims.pwd
    ) {
      throw new InvalidResetTokenError('stale_claims');
    }

    const passwordHash = await Password.hash(command.newPassword);
    const updated = await this.userRepo.updatePasswordHash(user.id, passwordHash);
    if (updated) {
      logger.info('Password reset completed', { userId: user.id });
    }
    return updated;
  }
}
