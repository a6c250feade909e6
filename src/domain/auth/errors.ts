export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Why a presented token was rejected. Kept for logs and telemetry only;
 * callers show the same message for every reason.
 */
export type TokenFailureReason =
  | 'expired'
  | 'bad_signature'
  | 'malformed'
  | 'wrong_type'
  | 'unknown_subject'
  | 'stale_claims';

export class DuplicateEmailError extends DomainError {
  constructor(message = 'Email already registered') {
    super(message);
  }
}

export class InvalidCredentialsError extends DomainError {
  constructor(message = 'Invalid email or password') {
    super(message);
  }
}

export class IncorrectPasswordError extends DomainError {
  constructor(message = 'Current password is incorrect') {
    super(message);
  }
}

export class InvalidTokenError extends DomainError {
  constructor(
    public readonly reason: TokenFailureReason,
    message = 'Invalid or expired token'
  ) {
    super(message);
  }
}

export class InvalidResetTokenError extends DomainError {
  constructor(
    public readonly reason: TokenFailureReason,
    message = 'Invalid or expired reset token'
  ) {
    super(message);
  }
}
