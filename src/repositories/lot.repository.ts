// ============================================
// MELIAPP - Lot Repository
// ============================================

import { and, asc, desc, eq, max, sql } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import {
  lotes,
  loteComposicion,
  type LoteRow,
} from '../db/schema/lots.js';
import { usuarios } from '../db/schema/users.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { Composition } from '../shared/composition.js';

export interface Lot {
  id: string;
  userId: string;
  nombreMiel: string;
  temporada: number;
  anio: number;
  kgProducidos: number;
  ordenMiel: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface LotFields {
  nombreMiel: string;
  temporada: number;
  anio: number;
  kgProducidos: number;
}

export class LotRepository extends BaseRepository {
  constructor(db: DrizzleDb) {
    super(db);
  }

  async listByUser(userId: string): Promise<Lot[]> {
    const rows = await this.db
      .select()
      .from(lotes)
      .where(eq(lotes.authUserId, userId))
      .orderBy(asc(lotes.ordenMiel));
    return rows.map(row => this.rowToLot(row));
  }

  async getLot(id: string): Promise<Lot | null> {
    const rows = await this.db
      .select()
      .from(lotes)
      .where(eq(lotes.id, id))
      .limit(1);
    const row = this.first(rows);
    return row ? this.rowToLot(row) : null;
  }

  /**
   * Appends a lot at the end of the owner's ordering.
   */
  async createLot(userId: string, fields: LotFields, composition?: Composition): Promise<Lot> {
    return this.inTransaction(async (tx) => {
      await this.lockOwner(tx, userId);
      const [{ value: lastOrder }] = await tx
        .select({ value: max(lotes.ordenMiel) })
        .from(lotes)
        .where(eq(lotes.authUserId, userId));

      const now = this.now();
      const rows = await tx
        .insert(lotes)
        .values({
          id: this.generateId(),
          authUserId: userId,
          ...fields,
          ordenMiel: (lastOrder ?? 0) + 1,
          createdAt: now,
          updatedAt: now,
        })
        .returning();
      const lot = this.rowToLot(rows[0]);

      if (composition) {
        await this.writeComposition(tx, lot.id, composition);
      }
      return lot;
    });
  }

  async updateLot(id: string, fields: LotFields, composition?: Composition): Promise<Lot | null> {
    return this.inTransaction(async (tx) => {
      const rows = await tx
        .update(lotes)
        .set({ ...fields, updatedAt: this.now() })
        .where(eq(lotes.id, id))
        .returning();
      const row = this.first(rows);
      if (!row) return null;

      if (composition) {
        await this.writeComposition(tx, id, composition);
      }
      return this.rowToLot(row);
    });
  }

  /**
   * Deletes the lot and closes the gap it leaves in the owner's ordering.
   * Returns the order the lot had, or null if it did not exist.
   */
  async deleteLot(id: string): Promise<number | null> {
    return this.inTransaction(async (tx) => {
      const deleted = await tx
        .delete(lotes)
        .where(eq(lotes.id, id))
        .returning({ userId: lotes.authUserId, ordenMiel: lotes.ordenMiel });
      const row = this.first(deleted);
      if (!row) return null;

      await this.lockOwner(tx, row.userId);
      const remaining = await tx
        .select({ id: lotes.id })
        .from(lotes)
        .where(eq(lotes.authUserId, row.userId))
        .orderBy(asc(lotes.ordenMiel));
      await this.renumber(tx, row.userId, remaining.map(r => r.id));
      return row.ordenMiel;
    });
  }

  // Caller guarantees `orderedIds` is exactly the owner's set of lot ids
  async reorder(userId: string, orderedIds: string[]): Promise<void> {
    await this.inTransaction(async (tx) => {
      await this.lockOwner(tx, userId);
      await this.renumber(tx, userId, orderedIds);
    });
  }

  async getComposition(lotId: string): Promise<Composition> {
    const rows = await this.db
      .select()
      .from(loteComposicion)
      .where(eq(loteComposicion.loteId, lotId))
      .orderBy(desc(loteComposicion.porcentaje), asc(loteComposicion.especie));

    const composition: Composition = {};
    for (const row of rows) {
      composition[row.especie] = row.porcentaje;
    }
    return composition;
  }

  async replaceComposition(lotId: string, composition: Composition): Promise<void> {
    await this.inTransaction(async (tx) => {
      await this.writeComposition(tx, lotId, composition);
    });
  }

  private async writeComposition(tx: DrizzleDb, lotId: string, composition: Composition): Promise<void> {
    await tx.delete(loteComposicion).where(eq(loteComposicion.loteId, lotId));

    const entries = Object.entries(composition).map(([especie, porcentaje]) => ({
      loteId: lotId,
      especie,
      porcentaje,
    }));
    if (entries.length > 0) {
      await tx.insert(loteComposicion).values(entries);
    }
  }

  // Serializes ordering changes per owner until the transaction ends
  private async lockOwner(tx: DrizzleDb, userId: string): Promise<void> {
    await tx
      .select({ id: usuarios.authUserId })
      .from(usuarios)
      .where(eq(usuarios.authUserId, userId))
      .for('no key update');
  }

  /**
   * Assigns orders 1..n following `orderedIds`. Orders are first moved to
   * negatives so no intermediate state collides on (auth_user_id, orden_miel).
   */
  private async renumber(tx: DrizzleDb, userId: string, orderedIds: string[]): Promise<void> {
    await tx
      .update(lotes)
      .set({ ordenMiel: sql`-${lotes.ordenMiel}` })
      .where(eq(lotes.authUserId, userId));

    for (const [index, id] of orderedIds.entries()) {
      await tx
        .update(lotes)
        .set({ ordenMiel: index + 1 })
        .where(and(eq(lotes.id, id), eq(lotes.authUserId, userId)));
    }
  }

  private rowToLot(row: LoteRow): Lot {
    return {
      id: row.id,
      userId: row.authUserId,
      nombreMiel: row.nombreMiel,
      temporada: row.temporada,
      anio: row.anio,
      kgProducidos: row.kgProducidos,
      ordenMiel: row.ordenMiel,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }
}
