import type { Database } from './store.js';
import { MemoryDatabase } from './memory-store.js';
import { PostgresDatabase } from './drizzle-store.js';

export interface DatabaseOptions {
  driver: 'postgres' | 'memory';
  url?: string;
}

export const createDatabase = (options: DatabaseOptions): Database => {
  if (options.driver === 'memory') {
    return new MemoryDatabase();
  }
  if (!options.url) {
    throw new Error('DATABASE_URL is required for the postgres driver');
  }
  return new PostgresDatabase(options.url);
};

export * from './schema.js';
export * from './store.js';
export { MemoryDatabase } from './memory-store.js';
export { PostgresDatabase, DrizzleTxClient, type DrizzleDb } from './drizzle-store.js';
