/**
 * Database Connection Pool Configuration
 *
 * Runs are batch reads: a handful of large queries per request rather than
 * many small ones, so the pool stays small and idle connections are released quickly.
 */

import { env } from './env';

/**
 * See: https://node-postgres.com/apis/pool
 */
export const DATABASE_POOL_CONFIG = {
  /**
   * Connections kept open between runs
   */
  min: 1,

  /**
   * Upper bound per app instance (env.DB_MAX_CONNECTIONS)
   */
  max: env.DB_MAX_CONNECTIONS,

  /**
   * Idle connection timeout (1 minute)
   *
   * Analysis runs are infrequent; holding connections between them only costs the database.
   */
  idleTimeoutMillis: 60_000,

  /**
   * Connection acquisition timeout (10 seconds)
   */
  connectionTimeoutMillis: 10_000,

  /**
   * Recycle a connection after this many queries
   */
  maxUses: 7_500,
} as const;

export type DatabasePoolConfig = typeof DATABASE_POOL_CONFIG;
