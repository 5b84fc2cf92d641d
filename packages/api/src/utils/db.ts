import postgres from 'postgres';
import type { AppConfig } from '../config';
import { logger } from './logger';

/**
 * PostgreSQL connection pool.
 *
 * Used by:
 * - Dense retrieval (pgvector similarity over chunks.embedding)
 * - Chunk store (id → chunk resolution, lexical snapshot loading)
 */

export type Sql = postgres.Sql;

export function createSql(database: AppConfig['database']): Sql {
  return postgres({
    host: database.host,
    port: database.port,
    database: database.database,
    user: database.user,
    password: database.password,
    max: 20, // Maximum pool size
    idle_timeout: 20,
    connect_timeout: 10,
  });
}

/**
 * Health check: verify database connectivity.
 */
export async function checkDatabaseHealth(sql: Sql): Promise<boolean> {
  try {
    await sql`SELECT 1`;
    return true;
  } catch (error) {
    logger.warn({ error }, 'Database health check failed');
    return false;
  }
}
