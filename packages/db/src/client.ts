import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema/index.js';

/**
 * Open a pooled connection. Nothing connects until the first query.
 */
export function createDatabase(connectionString: string) {
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to open the world database');
  }

  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,       // Close idle connections after 30s
    connectionTimeoutMillis: 10000, // Wait up to 10s for a connection
    statement_timeout: 30000,       // Kill queries running longer than 30s
  });

  const db = drizzle(pool, { schema });
  return { db, pool };
}

export type Database = ReturnType<typeof createDatabase>['db'];
