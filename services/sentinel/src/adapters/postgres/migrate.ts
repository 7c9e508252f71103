import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool } from 'pg';

const migrationsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), './migrations');

const MIGRATIONS = ['001_init.sql'];

export const runMigrations = async (pool: Pool) => {
  const client = await pool.connect();
  try {
    for (const file of MIGRATIONS) {
      const sql = await readFile(path.join(migrationsDir, file), 'utf8');
      await client.query(sql);
    }
  } finally {
    client.release();
  }
};
