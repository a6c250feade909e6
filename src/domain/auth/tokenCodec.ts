import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { ROLES, Role } from './user.js';
import type { TokenFailureReason } from './errors.js';

const ALGORITHM = 'HS256';

export interface SessionPayload {
  kind: 'session';
  sub: number;
  email: string;
  role: Role;
  jti?: string;
}

export interface ResetPayload {
  kind: 'reset';
  sub: number;
  email: string;
  /** Fingerprint of the password hash the token was issued against. */
  pwd: string;
}

export type TokenPayload = SessionPayload | ResetPayload;

export type TokenClaims = TokenPayload & {
  iat: number;
  exp: number;
};

export type CodecFailureReason = Extract<
  TokenFailureReason,
  'expired' | 'bad_signature' | 'malformed'
>;

export type DecodeResult =
  | { ok: true; claims: TokenClaims }
  | { ok: false; reason: CodecFailureReason };

export type Clock = () => Date;

const subjectSchema = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => Number(value));

const resetClaimsSchema = z
  .object({
    type: z.literal('reset'),
    sub: subjectSchema,
    email: z.string(),
    pwd: z.string().min(1),
    iat: z.number().int(),
    exp: z.number().int(),
  })
  .transform(
    (c): TokenClaims => ({
      kind: 'reset',
      sub: c.sub,
      email: c.email,
      pwd: c.pwd,
      iat: c.iat,
      exp: c.exp,
    })
  );

const sessionClaimsSchema = z
  .object({
    sub: subjectSchema,
    email: z.string(),
    role: z.enum(ROLES),
    jti: z.string().optional(),
    iat: z.number().int(),
    exp: z.number().int(),
  })
  .transform(
    (c): TokenClaims => ({
      kind: 'session',
      sub: c.sub,
      email: c.email,
      role: c.role,
      jti: c.jti,
      iat: c.iat,
      exp: c.exp,
    })
  );

const tokenClaimsSchema = z.union([resetClaimsSchema, sessionClaimsSchema]);

function toWire(payload: TokenPayload): Record<string, string> {
  switch (payload.kind) {
    case 'session': {
      const wire: Record<string, string> = {
        sub: String(payload.sub),
        email: payload.email,
        role: payload.role,
      };
      if (payload.jti) {
        wire.jti = payload.jti;
      }
      return wire;
    }
    case 'reset':
      return {
        sub: String(payload.sub),
        email: payload.email,
        type: 'reset',
        pwd: payload.pwd,
      };
  }
}

// jws parses the header and payload with a bare JSON.parse, so a token
// with a non-JSON segment surfaces as a plain SyntaxError
function classifyVerifyError(error: unknown): CodecFailureReason {
  if (error instanceof jwt.TokenExpiredError) {
    return 'expired';
  }
  if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
    return 'bad_signature';
  }
  return 'malformed';
}

/**
 * Signs and verifies HS256 JWTs for session and reset tokens.
 *
 * Expiry is checked against the injected clock with no skew tolerance: a
 * token is rejected from the second its `exp` is reached.
 */
export class TokenCodec {
  constructor(
    private readonly secret: string,
    private readonly clock: Clock = () => new Date()
  ) {}

  encode(payload: TokenPayload, ttlSeconds: number): string {
    const iat = this.nowSeconds();
    return jwt.sign(
      { ...toWire(payload), iat, exp: iat + ttlSeconds },
      this.secret,
      { algorithm: ALGORITHM }
    );
  }

  /**
   * Verify signature and expiry, then shape-check the claims.
   * Never throws for a bad token; the failure comes back as a reason.
   */
  decode(token: string): DecodeResult {
    let verified: string | JwtPayload;
    try {
      verified = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      return { ok: false, reason: classifyVerifyError(error) };
    }

    const parsed = tokenClaimsSchema.safeParse(verified);
    if (!parsed.success) {
      return { ok: false, reason: 'malformed' };
    }
    return { ok: true, claims: parsed.data };
  }

  private nowSeconds(): number {
    return Math.floor(this.clock().getTime() / 1000);
  }
}
