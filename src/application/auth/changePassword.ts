import { Password } from '../../domain/auth/password.js';
import type { UserRepository } from '../../domain/auth/user.js';
import { IncorrectPasswordError } from '../../domain/auth/errors.js';

export interface ChangePasswordCommand {
  userId: number;
  currentPassword: string;
  newPassword: string;
}

export class ChangePasswordUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: ChangePasswordCommand): Promise<boolean> {
    const user = await this.userRepo.findById(command.userId);
    if (!user || !(await Password.verify(command.currentPassword, user.passwordHash))) {
      throw new IncorrectPasswordError();
    }

    const passwordHash = await Password.hash(command.newPassword);
    return await this.userRepo.updatePasswordHash(user.id, passwordHash);
  }
}
