// Postgres storage: drizzle-orm over postgres.js

export { createDatabase, type Database, type DatabaseConfig } from './db.js';
export * from './schema/index.js';
export * from './repositories/index.js';
