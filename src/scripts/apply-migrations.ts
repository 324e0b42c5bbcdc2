/**
 * Apply Database Migrations
 *
 * Applies every migrations/*.sql file not yet recorded in schema_migrations,
 * in filename order, each in its own transaction.
 *
 * Run: npm run migrate (from the repository root)
 */

import dotenv from 'dotenv';
dotenv.config();

import { Client } from 'pg';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { errorMessage } from '../models/errors/api-error';
import { logger } from '../utils/logger';

const MIGRATIONS_DIR = join(process.cwd(), 'migrations');

export function listMigrationFiles(dir: string = MIGRATIONS_DIR): string[] {
  return readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

async function runMigrations(): Promise<void> {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL not found in environment');
  }

  const client = new Client({ connectionString });
  await client.connect();

  try {
    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         name VARCHAR(255) PRIMARY KEY,
         applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
       )`
    );

    const { rows } = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
    const applied = new Set(rows.map((row) => row.name));

    for (const file of listMigrationFiles()) {
      if (applied.has(file)) {
        logger.debug('Migration already applied', { file });
        continue;
      }

      const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf-8');
      logger.info('Applying migration', { file, sizeKb: Number((sql.length / 1024).toFixed(1)) });

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw new Error(`Migration ${file} failed: ${errorMessage(error)}`);
      }
    }

    logger.info('Migrations complete');
  } finally {
    await client.end();
  }
}

if (require.main === module) {
  runMigrations()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Migration run failed', { error: errorMessage(error) });
      process.exit(1);
    });
}
