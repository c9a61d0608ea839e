import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { pool } from './client.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * tsc does not copy .sql files, so a build under dist/ reads the
 * migrations from the source tree.
 */
function resolveMigrationsDir(): string {
  const beside = path.join(__dirname, 'migrations');
  if (fs.existsSync(beside)) return beside;
  return path.join(process.cwd(), 'src', 'db', 'migrations');
}

/**
 * Run all pending SQL migrations.
 * Safe to call multiple times — tracks applied migrations.
 * Does NOT close the pool (caller manages lifecycle).
 */
export async function runMigrations(): Promise<void> {
  console.log('[migrate] Running database migrations...');

  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const migrationsDir = resolveMigrationsDir();
  const files = fs.readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const { rows } = await pool.query(
      'SELECT 1 FROM _migrations WHERE name = $1',
      [file],
    );

    if (rows.length > 0) {
      console.log(`[migrate]   ${file} (already applied)`);
      continue;
    }

    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    await pool.query(sql);
    await pool.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
    console.log(`[migrate]   ${file} (applied)`);
  }

  console.log('[migrate] Migrations complete.');
}

// Allow running directly: npx tsx src/db/migrate.ts
const isDirectRun = process.argv[1]?.includes('migrate');
if (isDirectRun) {
  runMigrations()
    .then(() => pool.end())
    .catch((err) => {
      console.error('Migration failed:', err);
      process.exit(1);
    });
}
