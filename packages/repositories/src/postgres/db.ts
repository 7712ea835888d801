import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
  /** Seconds an idle connection is kept before it is closed. */
  idleTimeoutSeconds?: number;
};

/**
 * Open the postgres client and wrap it in Drizzle with the log_lines schema.
 *
 * The caller owns `client` and should `client.end()` it when the log
 * context is no longer needed.
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 4,
    idle_timeout: config.idleTimeoutSeconds ?? 30,
    onnotice: () => {},
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
export type DatabaseClient = ReturnType<typeof createDatabase>['client'];
