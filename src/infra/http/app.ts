import express from 'express';
import type { AuthFacade } from '../../application/auth/authFacade.js';
import type { ResetTokenDelivery } from '../../application/auth/resetTokenDelivery.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';

export interface AppDependencies {
  auth: AuthFacade;
  resetDelivery: ResetTokenDelivery;
  /** Resolves when the backing store answers. */
  healthCheck: () => Promise<unknown>;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Application {
  const app = express();

  app.use(express.json());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(deps.healthCheck(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());

  app.use('/api/auth', createAuthRoutes(deps.auth, deps.resetDelivery));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
