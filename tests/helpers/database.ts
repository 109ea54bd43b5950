// ============================================
// MELIAPP - In-process Postgres for tests
// ============================================

import { readFile } from 'node:fs/promises';
import path from 'path';
import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import * as schema from '../../src/db/schema/index.js';
import type { DrizzleDb } from '../../src/db/drizzle.js';

const DDL_PATH = path.join(process.cwd(), 'drizzle', '0000_init.sql');

const ALL_TABLES = [
  'lote_clicks',
  'lote_composicion',
  'lotes',
  'solicitudes_apicultor',
  'origenes_botanicos',
  'produccion_apicola',
  'ubicaciones',
  'info_contacto',
  'usuarios',
];

export interface TestDatabase {
  db: DrizzleDb;
  client: PGlite;
  reset(): Promise<void>;
  close(): Promise<void>;
}

export async function createTestDatabase(): Promise<TestDatabase> {
  const client = new PGlite();
  await client.exec(await readFile(DDL_PATH, 'utf-8'));
  const db: DrizzleDb = drizzle(client, { schema });

  return {
    db,
    client,
    reset: async () => {
      await client.exec(`TRUNCATE ${ALL_TABLES.map(t => `"${t}"`).join(', ')} CASCADE`);
    },
    close: () => client.close(),
  };
}
