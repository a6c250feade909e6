import { Password } from '../../domain/auth/password.js';
import { normalizeEmail, User, UserRepository } from '../../domain/auth/user.js';
import { InvalidCredentialsError } from '../../domain/auth/errors.js';
import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import type { AuthConfig } from './config.js';
import { issueSessionToken } from './sessionToken.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  user: User;
  token: string;
}

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenCodec,
    private config: AuthConfig
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    // Unknown email and wrong password fail the same way
    const user = await this.userRepo.findByEmail(normalizeEmail(command.email));
    if (!user) {
      throw new InvalidCredentialsError();
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    return {
      user,
      token: issueSessionToken(this.tokens, this.config, user),
    };
  }
}
