// scripts/run-migrations.ts
// What: Applies the SQL files in src/db/migrations to DATABASE_URL.
// How: Discovers *.sql files, sorts them by name and runs each one on a single connection from the shared pool
//      factory. Every file wraps itself in BEGIN/COMMIT and uses IF NOT EXISTS, so re-running is harmless.

import 'dotenv/config';
import { promises as fs } from 'fs';
import path from 'path';
import { createPool } from '../src/db/pool.js';
import logger from '../src/logging.js';

async function main(): Promise<void> {
  const migrationsDir = path.resolve(process.cwd(), 'src/db/migrations');
  const entries = await fs.readdir(migrationsDir, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile() && e.name.endsWith('.sql'))
    .map((e) => e.name)
    .sort((a, b) => a.localeCompare(b));

  if (files.length === 0) {
    logger.info({ dir: migrationsDir }, 'No migrations found');
    return;
  }

  const connStr = process.env.DATABASE_URL;
  if (!connStr) {
    throw new Error('DATABASE_URL is not set');
  }

  // Target without the password
  try {
    const u = new URL(connStr);
    logger.info(
      { user: u.username, host: u.hostname, port: u.port || '5432', database: u.pathname.replace(/^\//, '') },
      'Migration target',
    );
  } catch (e) {
    logger.warn({ err: e }, 'Could not parse DATABASE_URL');
  }

  const pool = createPool(connStr);
  try {
    const client = await pool.connect();
    try {
      for (const file of files) {
        const sql = await fs.readFile(path.join(migrationsDir, file), 'utf8');
        await client.query(sql);
        logger.info({ file }, 'Applied migration');
      }
    } finally {
      client.release();
    }
  } finally {
    await pool.end();
  }

  logger.info({ count: files.length }, 'Migrations complete');
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Migration failed');
  process.exit(1);
});
