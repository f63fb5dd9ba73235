// Postgres connection for the session-summary and knowledge tables

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export const DEFAULT_MAX_CONNECTIONS = 10;

export type DatabaseConfig = {
  connectionString: string;

  /** Default: 10 */
  maxConnections?: number;
};

/**
 * Open a pooled client and wrap it in Drizzle with the huddle schema.
 * Connections open lazily on the first query. The caller owns the client
 * and ends it on shutdown.
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? DEFAULT_MAX_CONNECTIONS,
  });

  return { db: drizzle(client, { schema }), client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
