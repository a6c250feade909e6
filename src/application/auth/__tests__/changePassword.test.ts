import { describe, it, expect, beforeEach } from 'vitest';
import { ChangePasswordUseCase } from '../changePassword.js';
import { RegisterUseCase } from '../register.js';
import { Password } from '../../../domain/auth/password.js';
import { IncorrectPasswordError } from '../../../domain/auth/errors.js';
import type { User } from '../../../domain/auth/user.js';
import { InMemoryUserRepo } from '../../../__tests__/inMemoryUserRepo.js';

describe('ChangePasswordUseCase', () => {
  let userRepo: InMemoryUserRepo;
  let useCase: ChangePasswordUseCase;
  let user: User;

  beforeEach(async () => {
    userRepo = new InMemoryUserRepo();
    useCase = new ChangePasswordUseCase(userRepo);
    user = await new RegisterUseCase(userRepo).execute({
      firstName: 'A',
      lastName: 'B',
      email: 'a@x.com',
      password: 'Passw0rd1',
    });
  });

  it('should replace the password hash', async () => {
    const changed = await useCase.execute({
      userId: user.id,
      currentPassword: 'Passw0rd1',
      newPassword: 'NewPassw0rd',
    });

    expect(changed).toBe(true);
    const stored = await userRepo.findById(user.id);
    expect(stored?.passwordHash).not.toBe(user.passwordHash);
    expect(await Password.verify('NewPassw0rd', stored?.passwordHash ?? '')).toBe(true);
    expect(await Password.verify('Passw0rd1', stored?.passwordHash ?? '')).toBe(false);
  });

  it('should reject a wrong current password and keep the old hash', async () => {
    await expect(
      useCase.execute({
        userId: user.id,
        currentPassword: 'wrong-password',
        newPassword: 'NewPassw0rd',
      })
    ).rejects.toBeInstanceOf(IncorrectPasswordError);

    expect((await userRepo.findById(user.id))?.passwordHash).toBe(user.passwordHash);
  });

  it('should reject an unknown user the same way', async () => {
    await expect(
      useCase.execute({
        userId: 999,
        currentPassword: 'Passw0rd1',
        newPassword: 'NewPassw0rd',
      })
    ).rejects.toThrow('Current password is incorrect');
  });
});
