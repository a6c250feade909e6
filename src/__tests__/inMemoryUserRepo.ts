import {
  NewUser,
  normalizeEmail,
  Role,
  User,
  UserRepository,
} from '../domain/auth/user.js';
import { DuplicateEmailError } from '../domain/auth/errors.js';

/**
 * In-process UserRepository for tests. Mirrors the unique lower(email)
 * index of the users table.
 */
export class InMemoryUserRepo implements UserRepository {
  private users = new Map<number, User>();
  private nextId = 1;

  async findByEmail(email: string): Promise<User | null> {
    return this.lookupEmail(normalizeEmail(email));
  }

  async findById(id: number): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async create(user: NewUser): Promise<User> {
    const email = normalizeEmail(user.email);
    if (this.lookupEmail(email)) {
      throw new DuplicateEmailError();
    }

    const created: User = {
      ...user,
      email,
      id: this.nextId++,
      createdAt: new Date('2026-01-15T09:30:00.000Z'),
    };
    this.users.set(created.id, created);
    return created;
  }

  async updatePasswordHash(id: number, passwordHash: string): Promise<boolean> {
    const user = this.users.get(id);
    if (!user) {
      return false;
    }
    this.users.set(id, { ...user, passwordHash });
    return true;
  }

  // Admin-side edits the auth core never performs itself

  setRole(id: number, role: Role): void {
    this.patch(id, { role });
  }

  setEmail(id: number, email: string): void {
    this.patch(id, { email: normalizeEmail(email) });
  }

  private patch(id: number, changes: Partial<User>): void {
    const user = this.users.get(id);
    if (!user) {
      throw new Error(`No user ${id}`);
    }
    this.users.set(id, { ...user, ...changes });
  }

  private lookupEmail(email: string): User | null {
    for (const user of this.users.values()) {
      if (user.email === email) {
        return user;
      }
    }
    return null;
  }
}
