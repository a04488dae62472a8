/**
 * MySQL/MariaDB connection test.
 * Run: npm run db:test
 *
 * Remote hosts are reached over TLS with a longer connect timeout
 * (see parseDatabaseUrl).
 */
import { config } from 'dotenv';
import path from 'node:path';

// Load .env.local first, then .env (so local overrides)
config({ path: path.join(process.cwd(), '.env.local') });
config({ path: path.join(process.cwd(), '.env') });

import { loadConfig } from '../lib/config';
import { createPool } from '../lib/db';
import { maskDatabaseUrl } from '../lib/db-connection';

async function main() {
  const appConfig = loadConfig(process.env);
  console.log('Connecting to:', maskDatabaseUrl(process.env.DATABASE_URL ?? ''));

  const pool = createPool(appConfig.database);
  try {
    const rows = await pool.query<{ version: string }[]>('SELECT VERSION() AS version');
    console.log('✅ Connection OK. Server version:', rows[0]?.version ?? '—');
  } finally {
    await pool.end();
  }
}

main()
  .then(() => {
    console.log('Done.');
    process.exit(0);
  })
  .catch((err: unknown) => {
    console.error('❌ Connection failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
