import { logger } from '../../infra/logger.js';

/**
 * Hands a freshly issued reset token to the account owner, out of band.
 */
export interface ResetTokenDelivery {
  deliver(email: string, token: string): Promise<void>;
}

/**
 * Placeholder transport for environments without mail: records that a reset
 * was requested. The token itself is never written out.
 */
export class LoggingResetTokenDelivery implements ResetTokenDelivery {
  deliver(email: string): Promise<void> {
    const domain = email.split('@')[1] ?? 'unknown';
    logger.info('Password reset token issued', { emailDomain: domain });
    return Promise.resolve();
  }
}
