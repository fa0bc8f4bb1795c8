import 'dotenv/config';
import { migrate } from 'drizzle-orm/neon-http/migrator';
import { createDatabase } from '../src/infrastructure/db/client.js';
import { errorMessage } from '../src/domain/errors.js';
import { logger } from '../src/infrastructure/logger.js';

async function main(): Promise<void> {
  logger.info('Starting database migration');

  const db = createDatabase();

  try {
    await migrate(db, { migrationsFolder: './db/migrations' });
    logger.info('Migrations applied successfully');
  } catch (error) {
    logger.error({ error: errorMessage(error), step: 'migration' }, 'Migration failed');
    process.exitCode = 1;
  }
}

await main();
