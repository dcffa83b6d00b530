// ABOUTME: Migration runner script that applies SQL migrations to the database.
// ABOUTME: Migrations are generated from db/schema.ts with `npm run db:generate`.
import 'dotenv/config';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { createDatabase } from './client.js';

async function runMigrations() {
  const { db, sql } = createDatabase(process.env.DATABASE_URL ?? '');
  console.log('Running migrations...');

  try {
    await sql`CREATE EXTENSION IF NOT EXISTS vector`;
    await migrate(db, { migrationsFolder: './db/migrations' });
    console.log('Migrations completed successfully');
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await sql.end();
  }
}

await runMigrations();
