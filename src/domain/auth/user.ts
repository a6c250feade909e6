/**
 * Roles a user can hold. Closed set: adding one means revisiting every
 * exhaustive switch over `Role`.
 */
export const ROLES = ['user', 'admin'] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && (ROLES as readonly string[]).includes(value);
}

/**
 * User domain entity as seen by the auth core.
 */
export interface User {
  readonly id: number;
  readonly firstName: string;
  readonly lastName: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly role: Role;
  readonly createdAt: Date;
}

export interface NewUser {
  firstName: string;
  lastName: string;
  email: string;
  passwordHash: string;
  role: Role;
}

/**
 * Credential store the auth core reads and writes users through.
 * Implementations must enforce email uniqueness themselves and report a
 * violation as DuplicateEmailError.
 */
export interface UserRepository {
  findByEmail(email: string): Promise<User | null>;
  findById(id: number): Promise<User | null>;
  create(user: NewUser): Promise<User>;
  updatePasswordHash(id: number, passwordHash: string): Promise<boolean>;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function assertNever(value: never): never {
  throw new Error(`Unhandled role: ${String(value)}`);
}

/**
 * Whether a user holding `actual` may act where `required` is asked for.
 * Admins satisfy every role.
 */
export function roleSatisfies(actual: Role, required: Role): boolean {
  switch (required) {
    case 'user':
      return actual === 'user' || actual === 'admin';
    case 'admin':
      return actual === 'admin';
    default:
      return assertNever(required);
  }
}
