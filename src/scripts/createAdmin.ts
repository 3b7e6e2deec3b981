import dotenv from 'dotenv';
import { loadConfig } from '../infra/config.js';
import { createLogger } from '../infra/logger.js';
import { createPool } from '../infra/db/pool.js';
import { runMigrations } from '../infra/db/migrate.js';
import { UserRepo } from '../infra/db/userRepo.js';
import { BootstrapAdminUseCase } from '../application/auth/bootstrapAdmin.js';

dotenv.config();

/**
 * First-run setup: npm run create-admin -- <username> <password>
 */
async function createAdmin(argv: string[]): Promise<void> {
  const [username, password] = argv;
  if (!username || !password) {
    console.error('Usage: npm run create-admin -- <username> <password>');
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  const logger = createLogger(config.logLevel, { script: 'create-admin' });
  const pool = createPool(config.databaseUrl, logger);

  try {
    await runMigrations(pool, logger);
    const outcome = await new BootstrapAdminUseCase(new UserRepo(pool), logger).execute({
      username,
      password,
    });
    if (outcome === 'exists') {
      logger.warn('A primary admin already exists; nothing to do');
    }
  } catch (error) {
    logger.error('Could not create primary admin', {}, error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void createAdmin(process.argv.slice(2));
