// ============================================
// MELIAPP - Data Table Repository (read-only browsing)
// ============================================

import { asc, count } from 'drizzle-orm';
import type { PgTable } from 'drizzle-orm/pg-core';
import { BaseRepository } from './base.repository.js';
import {
  usuarios,
  infoContacto,
  ubicaciones,
  produccionApicola,
  origenesBotanicos,
  solicitudesApicultor,
} from '../db/schema/users.js';
import { lotes } from '../db/schema/lots.js';
import type { DrizzleDb } from '../db/drizzle.js';

export const BROWSABLE_TABLES = [
  'usuarios',
  'info_contacto',
  'ubicaciones',
  'produccion_apicola',
  'origenes_botanicos',
  'solicitudes_apicultor',
  'lotes',
] as const;
export type BrowsableTable = typeof BROWSABLE_TABLES[number];

export type TableRow = Record<string, unknown>;

interface TableSource {
  table: PgTable;
  page: (limit: number, offset: number) => Promise<TableRow[]>;
}

export class DataTableRepository extends BaseRepository {
  private readonly sources: Record<BrowsableTable, TableSource>;

  constructor(db: DrizzleDb) {
    super(db);
    this.sources = {
      usuarios: {
        table: usuarios,
        page: async (limit, offset) =>
          this.db.select().from(usuarios).orderBy(asc(usuarios.createdAt)).limit(limit).offset(offset),
      },
      info_contacto: {
        table: infoContacto,
        page: async (limit, offset) =>
          this.db.select().from(infoContacto).orderBy(asc(infoContacto.id)).limit(limit).offset(offset),
      },
      ubicaciones: {
        table: ubicaciones,
        page: async (limit, offset) =>
          this.db.select().from(ubicaciones).orderBy(asc(ubicaciones.createdAt)).limit(limit).offset(offset),
      },
      produccion_apicola: {
        table: produccionApicola,
        page: async (limit, offset) =>
          this.db.select().from(produccionApicola).orderBy(asc(produccionApicola.createdAt)).limit(limit).offset(offset),
      },
      origenes_botanicos: {
        table: origenesBotanicos,
        page: async (limit, offset) =>
          this.db.select().from(origenesBotanicos).orderBy(asc(origenesBotanicos.id)).limit(limit).offset(offset),
      },
      solicitudes_apicultor: {
        table: solicitudesApicultor,
        page: async (limit, offset) =>
          this.db.select().from(solicitudesApicultor).orderBy(asc(solicitudesApicultor.createdAt)).limit(limit).offset(offset),
      },
      lotes: {
        table: lotes,
        page: async (limit, offset) =>
          this.db.select().from(lotes).orderBy(asc(lotes.authUserId), asc(lotes.ordenMiel)).limit(limit).offset(offset),
      },
    };
  }

  async countRows(name: BrowsableTable): Promise<number> {
    const [{ value }] = await this.db
      .select({ value: count() })
      .from(this.sources[name].table);
    return value;
  }

  async listRows(name: BrowsableTable, limit: number, offset: number): Promise<TableRow[]> {
    return this.sources[name].page(limit, offset);
  }
}
