// Postgres log backend

export { createDatabase, type Database, type DatabaseClient, type DatabaseConfig } from './db.js';
export * from './schema/index.js';
export * from './repositories/index.js';
