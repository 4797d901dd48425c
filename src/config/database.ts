import { Pool, QueryResult, QueryResultRow } from 'pg';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { DATABASE_POOL_CONFIG } from '@/config/database.config';
import { DB_QUERY_LIMITS } from '@/config/businessRules';

/**
 * PostgreSQL connection pool
 *
 * Created on first use so the memory driver never opens one.
 * Configuration values come from database.config.ts
 */
let pool: Pool | null = null;

function getPool(): Pool {
  if (pool) {
    return pool;
  }

  pool = new Pool({
    host: env.DB_HOST,
    port: env.DB_PORT,
    database: env.DB_NAME,
    user: env.DB_USER,
    password: env.DB_PASSWORD,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
    min: DATABASE_POOL_CONFIG.min,
    max: DATABASE_POOL_CONFIG.max,
    idleTimeoutMillis: DATABASE_POOL_CONFIG.idleTimeoutMillis,
    connectionTimeoutMillis: DATABASE_POOL_CONFIG.connectionTimeoutMillis,
    maxUses: DATABASE_POOL_CONFIG.maxUses,
  });

  // Let pool handle client recycling - don't crash the process
  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
  });

  pool.on('connect', (client) => {
    logger.debug('New PostgreSQL client connected to pool');

    client
      .query(`SET statement_timeout = ${DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS}`)
      .then(() => {
        logger.debug(
          { timeout_ms: DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS },
          'Statement timeout configured for connection'
        );
      })
      .catch((error: unknown) => {
        logger.error({ error }, 'Failed to set statement timeout');
      });
  });

  return pool;
}

/**
 * Execute a SQL query with parameters
 * @param text - SQL query string
 * @param params - Query parameters
 */
export async function query<T extends QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();
  try {
    const result = await getPool().query<T>(text, params);
    const duration = Date.now() - start;

    if (duration >= DB_QUERY_LIMITS.SLOW_QUERY_THRESHOLD_MS) {
      logger.warn({ query: text, duration, rows: result.rowCount }, 'Slow SQL query');
    } else {
      logger.debug({ query: text, duration, rows: result.rowCount }, 'Executed SQL query');
    }

    return result;
  } catch (error) {
    logger.error(
      {
        error,
        query: text,
        paramCount: params?.length ?? 0,
      },
      'Database query error'
    );
    throw error;
  }
}

/**
 * Test database connection
 * Used for startup validation
 */
export async function testConnection(): Promise<boolean> {
  try {
    const result = await query<{ now: Date }>('SELECT NOW() AS now');
    logger.info({ time: result.rows[0]?.now }, 'Database connection successful');
    return true;
  } catch (error) {
    logger.error({ error }, 'Database connection failed');
    return false;
  }
}

/**
 * Close all connections in the pool
 * Should be called during graceful shutdown
 */
export async function closePool(): Promise<void> {
  if (!pool) {
    return;
  }
  await pool.end();
  pool = null;
  logger.info('Database pool closed');
}
