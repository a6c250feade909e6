import { describe, it, expect, beforeEach } from 'vitest';
import { RequestPasswordResetUseCase } from '../requestPasswordReset.js';
import { ResetPasswordUseCase } from '../resetPassword.js';
import { LoginUseCase } from '../login.js';
import { RegisterUseCase } from '../register.js';
import { Password } from '../../../domain/auth/password.js';
import { TokenCodec } from '../../../domain/auth/tokenCodec.js';
import {
  InvalidCredentialsError,
  InvalidResetTokenError,
} from '../../../domain/auth/errors.js';
import type { User } from '../../../domain/auth/user.js';
import { InMemoryUserRepo } from '../../../__tests__/inMemoryUserRepo.js';

const START = new Date('2026-03-01T12:00:00.000Z');
const START_SECONDS = START.getTime() / 1000;

describe('password reset', () => {
  let now: Date;
  let userRepo: InMemoryUserRepo;
  let tokens: TokenCodec;
  let requestReset: RequestPasswordResetUseCase;
  let resetPassword: ResetPasswordUseCase;
  let login: LoginUseCase;
  let user: User;

  beforeEach(async () => {
    now = START;
    userRepo = new InMemoryUserRepo();
    tokens = new TokenCodec('test-secret', () => now);
    requestReset = new RequestPasswordResetUseCase(userRepo, tokens);
    resetPassword = new ResetPasswordUseCase(userRepo, tokens);
    login = new LoginUseCase(userRepo, tokens, { jwtSecret: 'test-secret', sessionTtlHours: 24 });

    user = await new RegisterUseCase(userRepo).execute({
      firstName: 'A',
      lastName: 'B',
      email: 'a@x.com',
      password: 'Passw0rd1',
    });
  });

  async function rejectionOf(promise: Promise<unknown>): Promise<InvalidResetTokenError> {
    const error = await promise.catch((caught: unknown) => caught);
    if (!(error instanceof InvalidResetTokenError)) {
      throw new Error('expected an InvalidResetTokenError');
    }
    return error;
  }

  describe('RequestPasswordResetUseCase', () => {
    it('should return null for an unknown email', async () => {
      expect(await requestReset.execute('nobody@x.com')).toBeNull();
    });

    it('should issue a one-hour reset token bound to the current password', async () => {
      const token = await requestReset.execute('A@x.com');

      expect(token).not.toBeNull();
      expect(tokens.decode(token ?? '')).toEqual({
        ok: true,
        claims: {
          kind: 'reset',
          sub: user.id,
          email: 'a@x.com',
          pwd: Password.fingerprint(user.passwordHash),
          iat: START_SECONDS,
          exp: START_SECONDS + 3600,
        },
      });
    });
  });

  describe('ResetPasswordUseCase', () => {
    it('should set the new password so only it logs in', async () => {
      const token = await requestReset.execute('a@x.com');

      const reset = await resetPassword.execute({ token: token ?? '', newPassword: 'NewPassw0rd' });

      expect(reset).toBe(true);
      await expect(
        login.execute({ email: 'a@x.com', password: 'Passw0rd1' })
      ).rejects.toBeInstanceOf(InvalidCredentialsError);
      const { user: loggedIn } = await login.execute({ email: 'a@x.com', password: 'NewPassw0rd' });
      expect(loggedIn.id).toBe(user.id);
    });

    it('should refuse a session token', async () => {
      const { token } = await login.execute({ email: 'a@x.com', password: 'Passw0rd1' });

      const error = await rejectionOf(resetPassword.execute({ token, newPassword: 'NewPassw0rd' }));

      expect(error.reason).toBe('wrong_type');
      expect(error.message).toBe('Invalid or expired reset token');
    });

    it('should refuse the token after one hour', async () => {
      const token = await requestReset.execute('a@x.com');
      now = new Date(START.getTime() + 3600 * 1000);

      const error = await rejectionOf(
        resetPassword.execute({ token: token ?? '', newPassword: 'NewPassw0rd' })
      );

      expect(error.reason).toBe('expired');
    });

    it('should refuse a token that was already used', async () => {
      const token = (await requestReset.execute('a@x.com')) ?? '';
      await resetPassword.execute({ token, newPassword: 'NewPassw0rd' });

      const error = await rejectionOf(resetPassword.execute({ token, newPassword: 'Attacker123' }));

      expect(error.reason).toBe('stale_claims');
      const { user: loggedIn } = await login.execute({ email: 'a@x.com', password: 'NewPassw0rd' });
      expect(loggedIn.id).toBe(user.id);
    });

    it('should refuse a token issued before the email changed', async () => {
      const token = (await requestReset.execute('a@x.com')) ?? '';
      userRepo.setEmail(user.id, 'moved@x.com');

      const error = await rejectionOf(resetPassword.execute({ token, newPassword: 'NewPassw0rd' }));

      expect(error.reason).toBe('stale_claims');
    });

    it('should refuse a token for a user that no longer exists', async () => {
      const token = tokens.encode({ kind: 'reset', sub: 999, email: 'ghost@x.com', pwd: 'fp' }, 3600);

      const error = await rejectionOf(resetPassword.execute({ token, newPassword: 'NewPassw0rd' }));

      expect(error.reason).toBe('unknown_subject');
    });

    it('should refuse garbage', async () => {
      const error = await rejectionOf(
        resetPassword.execute({ token: 'garbage', newPassword: 'NewPassw0rd' })
      );

      expect(error.reason).toBe('malformed');
    });
  });
});
