export interface AuthConfig {
  /** Server-wide HS256 secret. Rotating it invalidates every outstanding token. */
  jwtSecret: string;
  sessionTtlHours: number;
}

/** Reset tokens live for one hour regardless of configuration. */
export const RESET_TOKEN_TTL_SECONDS = 60 * 60;

export function sessionTtlSeconds(config: AuthConfig): number {
  return config.sessionTtlHours * 60 * 60;
}
