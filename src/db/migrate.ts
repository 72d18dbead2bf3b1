/* eslint-disable no-console */
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config/index.js';
import { errorMessage } from '../errors/index.js';
import { createPool } from './postgres.js';

function migrationsDir(): string {
  const besideModule = fileURLToPath(new URL('./migrations', import.meta.url));
  if (fs.existsSync(besideModule)) {
    return besideModule;
  }
  // tsc does not copy .sql files into dist/
  return path.join(process.cwd(), 'src', 'db', 'migrations');
}

async function migrate(): Promise<void> {
  const pool = createPool(config.postgres);
  try {
    await pool.query(`
      CREATE TABLE IF NOT EXISTS migrations (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL UNIQUE,
        executed_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);

    const { rows: executed } = await pool.query<{ name: string }>('SELECT name FROM migrations');
    const executedNames = new Set(executed.map(row => row.name));

    const dir = migrationsDir();
    const files = fs.readdirSync(dir)
      .filter(f => f.endsWith('.sql'))
      .sort();

    for (const file of files) {
      if (executedNames.has(file)) {
        continue;
      }
      console.log(`Executing migration: ${file}`);
      const content = fs.readFileSync(path.join(dir, file), 'utf-8');

      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(content);
        await client.query('INSERT INTO migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
        console.log(`Migration ${file} completed successfully`);
      } catch (e) {
        await client.query('ROLLBACK');
        throw new Error(`Migration ${file} failed: ${errorMessage(e)}`, { cause: e });
      } finally {
        client.release();
      }
    }

    console.log('Migration process finished');
  } catch (err) {
    console.error('Migration failed:', errorMessage(err));
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
