import pg from 'pg';
import type { Logger } from 'pino';

const { Pool } = pg;

function parseDatabaseUrl(urlString: string): {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
} {
  let url: URL;
  try {
    url = new URL(urlString);
  } catch {
    return {};
  }

  // Best-effort support for postgres connection strings used by hosting providers.
  if (url.protocol !== 'postgres:' && url.protocol !== 'postgresql:') {
    return {};
  }

  const port = url.port ? parseInt(url.port, 10) : undefined;
  const databaseFromPath = url.pathname.replace(/^\/+/, '');

  return {
    host: url.hostname || undefined,
    port: typeof port === 'number' && !Number.isNaN(port) ? port : undefined,
    database: databaseFromPath ? databaseFromPath : undefined,
    user: url.username || undefined,
  };
}

/**
 * Load database configuration from environment variables.
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): pg.PoolConfig {
  const max = parseInt(env.DB_POOL_MAX || '20', 10);

  if (env.DATABASE_URL) {
    const parsed = parseDatabaseUrl(env.DATABASE_URL);
    return {
      connectionString: env.DATABASE_URL,
      ...(parsed.host ? { host: parsed.host } : {}),
      ...(typeof parsed.port === 'number' ? { port: parsed.port } : {}),
      ...(parsed.database ? { database: parsed.database } : {}),
      ...(parsed.user ? { user: parsed.user } : {}),
      ssl: {
        rejectUnauthorized: false,
      },
      max,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    };
  }

  return {
    host: env.DB_HOST || 'localhost',
    port: parseInt(env.DB_PORT || '5432', 10),
    database: env.DB_NAME || 'roomsafe',
    user: env.DB_USER || 'roomsafe',
    password: env.DB_PASSWORD || 'roomsafe_dev',
    ssl: env.DB_SSL === 'true',
    max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  };
}

let pool: pg.Pool | null = null;

/**
 * Get the shared database connection pool.
 * Creates the pool on first call.
 */
export function getPool(): pg.Pool {
  if (!pool) {
    pool = new Pool(loadDatabaseConfig());
  }
  return pool;
}

/**
 * Initialize the database connection pool.
 * Tests the connection and returns the pool.
 */
export async function initializeDatabase(logger: Logger): Promise<pg.Pool> {
  const dbPool = getPool();

  dbPool.on('error', (err) => {
    logger.error({ err }, 'Unexpected error on idle database client');
  });

  const client = await dbPool.connect();
  try {
    await client.query('SELECT NOW()');
    logger.info('Database connection established');
  } finally {
    client.release();
  }

  return dbPool;
}

/**
 * Close the database connection pool.
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Execute a transaction with automatic commit/rollback.
 */
export async function transaction<T>(
  dbPool: pg.Pool,
  callback: (client: pg.PoolClient) => Promise<T>
): Promise<T> {
  const client = await dbPool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Postgres SQLSTATE carried on driver errors.
 */
export function getPgErrorCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_LOCK_NOT_AVAILABLE = '55P03';

export { pg };
