/**
 * Apply the telemetry table migrations to DATABASE_URL
 */

import { closePool, getPool, runMigrations } from '../src/lib/db';
import { toError } from '../src/lib/error-logging';
import { logger } from '../src/lib/logger';

async function main(): Promise<void> {
  const applied = await runMigrations(getPool());
  logger.info('Migrations complete', { applied: applied.length });
}

main()
  .catch((error: unknown) => {
    logger.error('Migration failed', toError(error));
    process.exitCode = 1;
  })
  .finally(() => closePool());
