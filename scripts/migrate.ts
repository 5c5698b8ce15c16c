import { readdir, readFile } from 'node:fs/promises';
import pg from 'pg';
import { createJsonLogger } from '@shootline/common';

/**
 * Applies packages/db/sql/*.sql in file name order. Every statement is
 * idempotent, so the script can run on each deploy.
 *
 * Usage: npm run db:migrate
 */

const SQL_DIR = new URL('../packages/db/sql/', import.meta.url);
const logger = createJsonLogger();

const main = async () => {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is required');
  }

  const files = (await readdir(SQL_DIR)).filter((file) => file.endsWith('.sql')).sort();
  const client = new pg.Client({ connectionString });
  await client.connect();

  try {
    for (const file of files) {
      const sql = await readFile(new URL(file, SQL_DIR), 'utf8');
      await client.query(sql);
      logger.info('migration_applied', { file });
    }
  } finally {
    await client.end();
  }
};

main().catch((error: unknown) => {
  logger.error('migration_failed', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
