import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { get_pool, close_pool, with_transaction } from './index.js';
import { logger } from '../lib/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const MIGRATIONS_DIR = join(__dirname, 'migrations');

async function ensure_migrations_table(): Promise<void> {
  await get_pool().query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);
}

async function get_pending_migrations(): Promise<string[]> {
  const result = await get_pool().query<{ filename: string }>(
    'SELECT filename FROM schema_migrations ORDER BY id'
  );
  const applied = new Set(result.rows.map((row) => row.filename));

  const files = await readdir(MIGRATIONS_DIR);
  return files
    .filter((f) => f.endsWith('.sql') && !applied.has(f))
    .sort();
}

async function run_migration(filename: string): Promise<void> {
  const sql = await readFile(join(MIGRATIONS_DIR, filename), 'utf-8');

  await with_transaction(async (client) => {
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [filename]);
  });

  logger.info('migration applied', { filename });
}

export async function run_migrations(): Promise<void> {
  await ensure_migrations_table();
  const pending = await get_pending_migrations();

  if (pending.length === 0) {
    logger.info('no pending migrations');
    return;
  }

  logger.info('pending migrations', { count: pending.length, files: pending });

  for (const filename of pending) {
    await run_migration(filename);
  }

  logger.info('migrations complete', { applied: pending.length });
}

// Run directly if this is the main module
const is_main = process.argv[1]?.endsWith('migrate.ts') || process.argv[1]?.endsWith('migrate.js');
if (is_main) {
  run_migrations()
    .then(() => close_pool())
    .catch((err: unknown) => {
      logger.error('migration failed', {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      process.exit(1);
    });
}
