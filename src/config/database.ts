/**
 * Database Configuration
 * PostgreSQL connection settings
 */

import { getEnvBoolOrDefault, getEnvIntOrDefault, getEnvOrDefault } from './env.js';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolSize: number;
}

export const databaseConfig: DatabaseConfig = {
  host: getEnvOrDefault('DB_HOST', 'localhost'),
  port: getEnvIntOrDefault('DB_PORT', 5432),
  database: getEnvOrDefault('DB_NAME', 'knowledge_monitor'),
  user: getEnvOrDefault('DB_USER', 'postgres'),
  password: getEnvOrDefault('DB_PASSWORD', ''),
  ssl: getEnvBoolOrDefault('DB_SSL', false),
  poolSize: getEnvIntOrDefault('DB_POOL_SIZE', 10),
};

export function getDatabaseUrl(): string {
  // Use DATABASE_URL if provided (e.g., for Neon, Supabase, etc.)
  if (process.env.DATABASE_URL) {
    return process.env.DATABASE_URL;
  }

  const { host, port, database, user, password, ssl } = databaseConfig;
  const sslParam = ssl ? '?sslmode=require' : '';
  return `postgres://${user}:${password}@${host}:${port}/${database}${sslParam}`;
}
