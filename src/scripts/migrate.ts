import dotenv from 'dotenv';
import { loadConfig } from '../infra/config.js';
import { createLogger } from '../infra/logger.js';
import { createPool } from '../infra/db/pool.js';
import { runMigrations } from '../infra/db/migrate.js';

dotenv.config();

async function migrate(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, { script: 'migrate' });
  const pool = createPool(config.databaseUrl, logger);

  try {
    const applied = await runMigrations(pool, logger);
    logger.info('Migrations complete', { applied });
  } catch (error) {
    logger.error('Migration failed', {}, error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
