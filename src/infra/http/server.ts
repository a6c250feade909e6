import { AuthFacade } from '../../application/auth/authFacade.js';
import { LoggingResetTokenDelivery } from '../../application/auth/resetTokenDelivery.js';
import { loadConfig } from '../config.js';
import { logger } from '../logger.js';
import { pool } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { createApp } from './app.js';

const config = loadConfig();
logger.setLevel(config.logLevel);

const app = createApp({
  auth: new AuthFacade(new UserRepo(pool), config.auth),
  resetDelivery: new LoggingResetTokenDelivery(),
  healthCheck: () => pool.query('SELECT 1'),
});

app.listen(config.port, () => {
  logger.info('Server listening', {
    url: `http://localhost:${config.port}`,
    docs: `http://localhost:${config.port}/docs`,
  });
});
