/**
 * Seeds inventory reference data and the first administrator.
 * Idempotent: existing rows (by unique key) are left untouched.
 * Run: npm run db:seed
 */
import 'dotenv/config';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import bcrypt from 'bcryptjs';
import { z } from 'zod';
import { loadConfig } from '../lib/config';
import { createPool } from '../lib/db';
import { Role } from '../lib/constants/enums';

const seedSchema = z.object({
  locations: z.array(z.string().min(1)),
  categories: z.array(z.object({ key_name: z.string().regex(/^[a-z_]+$/), display_name: z.string().min(1) })),
});

const adminSchema = z.object({
  SEED_ADMIN_EMAIL: z.string().email(),
  SEED_ADMIN_PASSWORD: z.string().min(8),
});

async function main() {
  const appConfig = loadConfig(process.env);
  const seed = seedSchema.parse(
    JSON.parse(readFileSync(path.join(process.cwd(), 'db', 'seed-data.json'), 'utf8'))
  );
  const admin = adminSchema.parse(process.env);

  const pool = createPool(appConfig.database);
  try {
    console.log('Seeding database...');

    for (const name of seed.locations) {
      await pool.query('INSERT IGNORE INTO inventory_locations (name) VALUES (?)', [name]);
    }
    console.log(`  ${seed.locations.length} locations`);

    for (const category of seed.categories) {
      await pool.query('INSERT IGNORE INTO inventory_categories (key_name, display_name) VALUES (?, ?)', [
        category.key_name,
        category.display_name,
      ]);
    }
    console.log(`  ${seed.categories.length} categories`);

    const passwordHash = await bcrypt.hash(admin.SEED_ADMIN_PASSWORD, 10);
    await pool.query(
      `INSERT IGNORE INTO users (email, password, firstname, lastname, role)
       VALUES (?, ?, 'System', 'Administrator', ?)`,
      [admin.SEED_ADMIN_EMAIL.toLowerCase(), passwordHash, Role.ADMIN]
    );
    console.log(`  administrator ${admin.SEED_ADMIN_EMAIL}`);
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
    console.error('❌ Seed failed:', err);
    process.exit(1);
  });
