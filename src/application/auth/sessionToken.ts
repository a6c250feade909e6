import type { User } from '../../domain/auth/user.js';
import type { TokenCodec } from '../../domain/auth/tokenCodec.js';
import { AuthConfig, sessionTtlSeconds } from './config.js';

export function issueSessionToken(
  tokens: TokenCodec,
  config: AuthConfig,
  user: User,
  jti?: string
): string {
  return tokens.encode(
    {
      kind: 'session',
      sub: user.id,
      email: user.email,
      role: user.role,
      jti,
    },
    sessionTtlSeconds(config)
  );
}
