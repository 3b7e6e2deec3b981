import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { createPool } from '../db/pool.js';
import { runMigrations } from '../db/migrate.js';
import { UserRepo } from '../db/userRepo.js';
import { BillRepo } from '../db/billRepo.js';
import { BootstrapAdminUseCase } from '../../application/auth/bootstrapAdmin.js';
import { createApp } from './app.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, { service: 'parking-billing' });
  const pool = createPool(config.databaseUrl, logger);

  await runMigrations(pool, logger);

  const userRepo = new UserRepo(pool);
  const billRepo = new BillRepo(pool);
  await new BootstrapAdminUseCase(userRepo, logger).execute(config.bootstrapAdmin);

  const app = createApp({
    userRepo,
    billRepo,
    jwtSecret: config.jwtSecret,
    jwtTtlSeconds: config.jwtTtlSeconds,
    facility: config.facility,
    logger,
    ping: () => pool.query('SELECT 1'),
  });

  const server = app.listen(config.port, () => {
    logger.info('Server listening', {
      url: `http://localhost:${config.port}`,
      docs: `http://localhost:${config.port}/docs`,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error closing database pool', {}, error);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
