// Drizzle schema for the Postgres log backend

export * from './log-lines.js';
