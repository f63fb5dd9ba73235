// Postgres implementations (drizzle-orm over the postgres client)

export { createDatabase, type Database, type DatabaseConfig } from './db.js';
export * from './repositories/index.js';
export * as schema from './schema/index.js';
