import type { Role, User, UserRepository } from '../../domain/auth/user.js';
import { Clock, TokenCodec } from '../../domain/auth/tokenCodec.js';
import type { AuthConfig } from './config.js';
import { RegisterCommand, RegisterUseCase } from './register.js';
import { LoginCommand, LoginUseCase } from './login.js';
import { VerifyTokenUseCase } from './verifyToken.js';
import { ChangePasswordCommand, ChangePasswordUseCase } from './changePassword.js';
import { RequestPasswordResetUseCase } from './requestPasswordReset.js';
import { ResetPasswordCommand, ResetPasswordUseCase } from './resetPassword.js';
import { RefreshTokenUseCase } from './refreshToken.js';

/**
 * Transport shape of a user. Never carries the password hash.
 */
export interface UserRecord {
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  role: Role;
  createdAt: string;
}

export interface AuthenticatedUser {
  user: UserRecord;
  token: string;
}

export function toUserRecord(user: User): UserRecord {
  return {
    id: user.id,
    firstName: user.firstName,
    lastName: user.lastName,
    email: user.email,
    role: user.role,
    createdAt: user.createdAt.toISOString(),
  };
}

export interface AuthFacadeOptions {
  clock?: Clock;
}

/**
 * Entry point for callers outside the auth core: wires the use cases
 * around one token codec and maps users to plain records.
 */
export class AuthFacade {
  private readonly registerUseCase: RegisterUseCase;
  private readonly loginUseCase: LoginUseCase;
  private readonly verifyTokenUseCase: VerifyTokenUseCase;
  private readonly changePasswordUseCase: ChangePasswordUseCase;
  private readonly requestPasswordResetUseCase: RequestPasswordResetUseCase;
  private readonly resetPasswordUseCase: ResetPasswordUseCase;
  private readonly refreshTokenUseCase: RefreshTokenUseCase;

  constructor(
    private readonly userRepo: UserRepository,
    config: AuthConfig,
    options: AuthFacadeOptions = {}
  ) {
    const tokens = new TokenCodec(config.jwtSecret, options.clock);

    this.registerUseCase = new RegisterUseCase(userRepo);
    this.loginUseCase = new LoginUseCase(userRepo, tokens, config);
    this.verifyTokenUseCase = new VerifyTokenUseCase(userRepo, tokens);
    this.changePasswordUseCase = new ChangePasswordUseCase(userRepo);
    this.requestPasswordResetUseCase = new RequestPasswordResetUseCase(userRepo, tokens);
    this.resetPasswordUseCase = new ResetPasswordUseCase(userRepo, tokens);
    this.refreshTokenUseCase = new RefreshTokenUseCase(this.verifyTokenUseCase, tokens, config);
  }

  /**
   * Register, then log straight in so the client gets a session token.
   */
  async register(command: RegisterCommand): Promise<AuthenticatedUser> {
    await this.registerUseCase.execute(command);
    return await this.login({ email: command.email, password: command.password });
  }

  async login(command: LoginCommand): Promise<AuthenticatedUser> {
    const { user, token } = await this.loginUseCase.execute(command);
    return { user: toUserRecord(user), token };
  }

  async verifyToken(token: string): Promise<UserRecord | null> {
    const user = await this.verifyTokenUseCase.execute(token);
    return user ? toUserRecord(user) : null;
  }

  async changePassword(command: ChangePasswordCommand): Promise<boolean> {
    return await this.changePasswordUseCase.execute(command);
  }

  async requestPasswordReset(email: string): Promise<string | null> {
    return await this.requestPasswordResetUseCase.execute(email);
  }

  async resetPassword(command: ResetPasswordCommand): Promise<boolean> {
    return await this.resetPasswordUseCase.execute(command);
  }

  async refreshToken(token: string): Promise<string> {
    return await this.refreshTokenUseCase.execute(token);
  }

  async findUser(id: number): Promise<UserRecord | null> {
    const user = await this.userRepo.findById(id);
    return user ? toUserRecord(user) : null;
  }
}
