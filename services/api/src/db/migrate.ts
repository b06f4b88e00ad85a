import { readdir, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import pg from 'pg';
import { loadDatabaseConfig } from './index.js';
import { loadEnvFromDotEnvIfPresent } from '../env/loadEnv.js';

const MIGRATIONS_TABLE = 'schema_migrations';
const MIGRATIONS_DIR = new URL('../../migrations/', import.meta.url);

export interface Migration {
  id: number;
  name: string;
  filename: string;
  sql: string;
}

async function ensureMigrationsTable(client: pg.PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getExecutedMigrations(client: pg.PoolClient): Promise<Set<string>> {
  const result = await client.query<{ name: string }>(
    `SELECT name FROM ${MIGRATIONS_TABLE} ORDER BY id`
  );
  return new Set(result.rows.map((row) => row.name));
}

/**
 * Load `NNN_name.sql` files from the migrations directory, in filename order.
 */
export async function loadMigrations(dir: URL = MIGRATIONS_DIR): Promise<Migration[]> {
  const files = await readdir(fileURLToPath(dir));
  const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();

  const migrations: Migration[] = [];
  for (const filename of sqlFiles) {
    const match = /^(\d+)_(.+)\.sql$/.exec(filename);
    if (!match || match[1] === undefined) {
      console.warn(`Skipping invalid migration filename: ${filename}`);
      continue;
    }

    migrations.push({
      id: parseInt(match[1], 10),
      name: filename.replace('.sql', ''),
      filename,
      sql: await readFile(fileURLToPath(new URL(filename, dir)), 'utf-8'),
    });
  }

  return migrations;
}

/**
 * Run all pending migrations, each in its own transaction.
 */
export async function runMigrations(): Promise<void> {
  const config = loadDatabaseConfig();
  const pool = new pg.Pool(config);

  console.log(`Connecting to database: ${config.host}:${config.port}/${config.database}`);

  const client = await pool.connect();

  try {
    await ensureMigrationsTable(client);

    const executedMigrations = await getExecutedMigrations(client);
    const pendingMigrations = (await loadMigrations()).filter(
      (m) => !executedMigrations.has(m.name)
    );

    if (pendingMigrations.length === 0) {
      console.log('No pending migrations');
      return;
    }

    console.log(`Found ${pendingMigrations.length} pending migration(s)`);

    for (const migration of pendingMigrations) {
      console.log(`Running migration: ${migration.filename}`);

      await client.query('BEGIN');

      try {
        await client.query(migration.sql);
        await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [migration.name]);
        await client.query('COMMIT');
        console.log(`  ✓ ${migration.filename}`);
      } catch (error) {
        await client.query('ROLLBACK');
        console.error(`  ✗ ${migration.filename} failed:`, error);
        throw error;
      }
    }

    console.log('All migrations completed successfully');
  } finally {
    client.release();
    await pool.end();
  }
}

export async function showMigrationStatus(): Promise<void> {
  const pool = new pg.Pool(loadDatabaseConfig());
  const client = await pool.connect();

  try {
    await ensureMigrationsTable(client);

    const executedMigrations = await getExecutedMigrations(client);
    const migrations = await loadMigrations();

    console.log('\nMigration Status:');
    console.log('─'.repeat(60));

    for (const migration of migrations) {
      const status = executedMigrations.has(migration.name) ? '✓' : '○';
      console.log(`  ${status} ${migration.filename}`);
    }

    console.log('─'.repeat(60));
    console.log(
      `Total: ${migrations.length}, Executed: ${executedMigrations.size}, Pending: ${migrations.length - executedMigrations.size}`
    );
  } finally {
    client.release();
    await pool.end();
  }
}

function isEntrypoint(): boolean {
  return process.argv[1] !== undefined && fileURLToPath(import.meta.url) === process.argv[1];
}

if (isEntrypoint()) {
  loadEnvFromDotEnvIfPresent();
  const command = process.argv[2];

  switch (command) {
    case 'up':
    case 'migrate':
    case undefined:
      runMigrations().catch((err: unknown) => {
        console.error('Migration failed:', err);
        process.exit(1);
      });
      break;

    case 'status':
      showMigrationStatus().catch((err: unknown) => {
        console.error('Failed to get status:', err);
        process.exit(1);
      });
      break;

    default:
      console.log('Usage: migrate [command]');
      console.log('');
      console.log('Commands:');
      console.log('  up, migrate   Run pending migrations (default)');
      console.log('  status        Show migration status');
      process.exit(1);
  }
}
