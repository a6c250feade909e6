import { Password } from '../../domain/auth/password.js';
import { normalizeEmail, User, UserRepository } from '../../domain/auth/user.js';
import { DuplicateEmailError } from '../../domain/auth/errors.js';

export interface RegisterCommand {
  firstName: string;
  lastName: string;
  email: string;
  password: string;
}

export class RegisterUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: RegisterCommand): Promise<User> {
    const email = normalizeEmail(command.email);

    // The store's unique index is the real guard; this only fails fast
    const existing = await this.userRepo.findByEmail(email);
    if (existing) {
      throw new DuplicateEmailError();
    }

    const passwordHash = await Password.hash(command.password);

    return await this.userRepo.create({
      firstName: command.firstName.trim(),
      lastName: command.lastName.trim(),
      email,
      passwordHash,
      role: 'user',
    });
  }
}
