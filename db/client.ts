// ABOUTME: Database client factory using Drizzle ORM with the postgres.js driver.
// ABOUTME: Callers own the returned connection and end it on shutdown.
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';

export type Database = PostgresJsDatabase;

export interface DatabaseHandle {
  sql: postgres.Sql;
  db: Database;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set');
  }

  const sql = postgres(connectionString);
  return { sql, db: drizzle(sql) };
}
