// ============================================
// MELIAPP - Database Configuration
// ============================================

import postgres from 'postgres';
import { drizzle } from 'drizzle-orm/postgres-js';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { env, isProduction } from './env.js';
import * as schema from '../db/schema/index.js';

// Any Postgres driver drizzle supports (postgres-js in production, PGlite in tests)
export type DrizzleDb = PgDatabase<PgQueryResultHKT, typeof schema>;

let db: DrizzleDb | null = null;
let client: postgres.Sql | null = null;

export function getPostgresClient(): postgres.Sql {
  if (!client) {
    client = postgres(env.DATABASE_URL, {
      max: env.DB_POOL_SIZE,
      idle_timeout: 20,
      connect_timeout: 10,
      ssl: isProduction() ? 'require' : false,
    });
  }
  return client;
}

export function getDrizzleDb(): DrizzleDb {
  if (!db) {
    db = drizzle(getPostgresClient(), { schema });
  }
  return db;
}

export async function closeDatabaseConnection(): Promise<void> {
  if (client) {
    await client.end({ timeout: 5 });
    client = null;
    db = null;
  }
}
