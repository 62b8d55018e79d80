/**
 * Database Connection Module
 * Provides PostgreSQL connection pool using 'postgres' driver
 */

import postgres from 'postgres';
import { databaseConfig, getDatabaseUrl } from '../config/database.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('db');

// Singleton connection instance
let sql: postgres.Sql | null = null;

/**
 * Get or create the database connection
 */
export function getConnection(): postgres.Sql {
  if (!sql) {
    sql = postgres(getDatabaseUrl(), {
      max: databaseConfig.poolSize,
      idle_timeout: 30,
      connect_timeout: 10,
      onnotice: notice => log.debug({ notice }, 'Postgres notice'),
      transform: {
        undefined: null,
      },
    });
  }
  return sql;
}

/**
 * Close the database connection
 */
export async function closeConnection(): Promise<void> {
  if (sql) {
    await sql.end();
    sql = null;
  }
}

/**
 * Health check
 */
export async function healthCheck(): Promise<boolean> {
  try {
    const conn = getConnection();
    const result = await conn`SELECT 1 as ok`;
    return result.length > 0;
  } catch (error) {
    log.error({ error }, 'Database health check failed');
    return false;
  }
}
