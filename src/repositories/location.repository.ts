// ============================================
// MELIAPP - Location Repository
// ============================================

import { asc, eq, and, isNotNull } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { ubicaciones, type UbicacionRow } from '../db/schema/users.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface Location {
  id: string;
  userId: string;
  nombre: string;
  descripcion: string | null;
  plusCode: string;
  comuna: string | null;
  latitud: number | null;
  longitud: number | null;
  createdAt: Date;
}

export interface NewLocation {
  nombre: string;
  descripcion?: string | null;
  plusCode: string;
  comuna?: string | null;
}

export class LocationRepository extends BaseRepository {
  constructor(db: DrizzleDb) {
    super(db);
  }

  async listForUser(userId: string): Promise<Location[]> {
    const rows = await this.db
      .select()
      .from(ubicaciones)
      .where(eq(ubicaciones.authUserId, userId))
      .orderBy(asc(ubicaciones.createdAt));
    return rows.map(row => this.rowToLocation(row));
  }

  async findComuna(userId: string): Promise<string | null> {
    const rows = await this.db
      .select({ comuna: ubicaciones.comuna })
      .from(ubicaciones)
      .where(and(eq(ubicaciones.authUserId, userId), isNotNull(ubicaciones.comuna)))
      .orderBy(asc(ubicaciones.createdAt))
      .limit(1);
    return this.first(rows)?.comuna ?? null;
  }

  // A user keeps a single apiary location; saving replaces the previous one
  async replaceForUser(userId: string, location: NewLocation): Promise<Location> {
    return this.inTransaction(async (tx) => {
      await tx.delete(ubicaciones).where(eq(ubicaciones.authUserId, userId));
      const rows = await tx
        .insert(ubicaciones)
        .values({
          id: this.generateId(),
          authUserId: userId,
          nombre: location.nombre,
          descripcion: location.descripcion ?? null,
          normaGeo: location.plusCode,
          comuna: location.comuna ?? null,
          createdAt: this.now(),
        })
        .returning();
      return this.rowToLocation(rows[0]);
    });
  }

  private rowToLocation(row: UbicacionRow): Location {
    return {
      id: row.id,
      userId: row.authUserId,
      nombre: row.nombre,
      descripcion: row.descripcion,
      plusCode: row.normaGeo,
      comuna: row.comuna,
      latitud: row.latitud,
      longitud: row.longitud,
      createdAt: row.createdAt,
    };
  }
}
