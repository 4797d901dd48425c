/**
 * Database Connection Pool Configuration
 *
 * Only used with STORAGE_DRIVER=postgres.
 * See: https://node-postgres.com/apis/pool
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * Connections kept warm. Portfolio traffic is bursty (app opened,
   * a few reads, a couple of writes), so a small floor is enough.
   */
  min: 2,

  /**
   * Upper bound per app instance (PostgreSQL default max_connections = 100)
   */
  max: env.DB_MAX_CONNECTIONS,

  idleTimeoutMillis: 300_000, // 5 minutes

  /**
   * Fail the request if no connection frees up in 10 seconds
   */
  connectionTimeoutMillis: 10_000,

  /**
   * Recycle a connection after this many queries
   */
  maxUses: 7_500,
} as const;
