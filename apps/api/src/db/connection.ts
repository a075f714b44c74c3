/**
 * FILE PURPOSE: Database connection singleton with validation
 *
 * HOW: postgres.js connection from DATABASE_URL, wrapped in Drizzle ORM.
 *      Throws in production if DATABASE_URL is missing. Exports
 *      closeDatabase() for graceful shutdown.
 */

import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export type Database = PostgresJsDatabase<typeof schema>;

const connectionString = process.env.DATABASE_URL ?? '';

if (!connectionString) {
  if (process.env.NODE_ENV === 'production') {
    throw new Error('FATAL: DATABASE_URL is required in production. Set it before starting the server.');
  }
  process.stderr.write('WARN: DATABASE_URL not set; database queries will fail. Set it in .env for local development.\n');
}

const client = postgres(connectionString, {
  max: 10,
  idle_timeout: 20,
  connect_timeout: 10,
});

export const db: Database = drizzle(client, { schema });

/** Close the database connection pool. Call during graceful shutdown. */
export async function closeDatabase(): Promise<void> {
  try {
    await client.end({ timeout: 5 });
  } catch (err) {
    process.stderr.write(`WARN: Error closing database connection: ${err}\n`);
  }
}
