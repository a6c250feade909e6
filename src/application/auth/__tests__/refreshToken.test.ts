import { describe, it, expect, beforeEach } from 'vitest';
import { RefreshTokenUseCase } from '../refreshToken.js';
import { VerifyTokenUseCase } from '../verifyToken.js';
import { LoginUseCase } from '../login.js';
import { RegisterUseCase } from '../register.js';
import { TokenCodec } from '../../../domain/auth/tokenCodec.js';
import { InvalidTokenError } from '../../../domain/auth/errors.js';
import type { User } from '../../../domain/auth/user.js';
import { InMemoryUserRepo } from '../../../__tests__/inMemoryUserRepo.js';

const START = new Date('2026-03-01T12:00:00.000Z');
const START_SECONDS = START.getTime() / 1000;
const config = { jwtSecret: 'test-secret', sessionTtlHours: 24 };

describe('RefreshTokenUseCase', () => {
  let now: Date;
  let tokens: TokenCodec;
  let verifyToken: VerifyTokenUseCase;
  let useCase: RefreshTokenUseCase;
  let user: User;
  let token: string;

  beforeEach(async () => {
    now = START;
    const userRepo = new InMemoryUserRepo();
    tokens = new TokenCodec(config.jwtSecret, () => now);
    verifyToken = new VerifyTokenUseCase(userRepo, tokens);
    useCase = new RefreshTokenUseCase(verifyToken, tokens, config);

    user = await new RegisterUseCase(userRepo).execute({
      firstName: 'A',
      lastName: 'B',
      email: 'a@x.com',
      password: 'Passw0rd1',
    });
    ({ token } = await new LoginUseCase(userRepo, tokens, config).execute({
      email: 'a@x.com',
      password: 'Passw0rd1',
    }));
  });

  it('should issue a different token that verifies to the same user', async () => {
    const refreshed = await useCase.execute(token);

    expect(refreshed).not.toBe(token);
    expect(await verifyToken.execute(refreshed)).toEqual(user);
  });

  it('should issue distinct tokens within the same second', async () => {
    const first = await useCase.execute(token);
    const second = await useCase.execute(token);

    expect(first).not.toBe(second);
  });

  it('should restart the lifetime from the refresh time', async () => {
    now = new Date(START.getTime() + 12 * 3600 * 1000);

    const decoded = tokens.decode(await useCase.execute(token));

    expect(decoded.ok).toBe(true);
    if (decoded.ok) {
      expect(decoded.claims.iat).toBe(START_SECONDS + 12 * 3600);
      expect(decoded.claims.exp).toBe(START_SECONDS + 36 * 3600);
      expect(decoded.claims.kind === 'session' && typeof decoded.claims.jti).toBe('string');
    }
  });

  it('should refuse an expired token', async () => {
    now = new Date(START.getTime() + 24 * 3600 * 1000);

    const error = await useCase.execute(token).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InvalidTokenError);
    expect(error).toHaveProperty('reason', 'expired');
  });

  it('should refuse garbage', async () => {
    await expect(useCase.execute('garbage')).rejects.toThrow('Invalid or expired token');
  });
});
