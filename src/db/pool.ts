// =============================================================================
// BASTION — Database Connection Pool
// =============================================================================

import { Pool } from 'pg';
import { AppConfig } from '../config';
import { Logger } from '../types/logger';

/**
 * Create the shared pg pool. Built once in server.ts and handed to every
 * repository; nothing imports a module-level pool.
 */
export function createPool(config: AppConfig['db'], logger: Logger = console): Pool {
  const pool = new Pool({
    connectionString: config.connectionString,
    max: config.maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (err) => {
    logger.error('[DB] Unexpected pool error:', err.message);
  });

  return pool;
}
