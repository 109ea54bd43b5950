// ============================================
// MELIAPP - Production Repository (production, botanical origins, requests)
// ============================================

import { desc, eq } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import {
  produccionApicola,
  origenesBotanicos,
  solicitudesApicultor,
  type ProduccionRow,
  type OrigenBotanicoRow,
  type SolicitudRow,
} from '../db/schema/users.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface ProductionRecord {
  id: string;
  temporada: string;
  cantidadKg: number;
  descripcion: string | null;
}

export interface BotanicalOrigin {
  id: string;
  especie: string;
  comuna: string | null;
  descripcion: string | null;
}

export interface BeekeeperRequest {
  id: string;
  nombreCompleto: string;
  nombreEmpresa: string | null;
  region: string | null;
  comuna: string | null;
  telefono: string | null;
  status: string;
  createdAt: Date;
}

export class ProductionRepository extends BaseRepository {
  constructor(db: DrizzleDb) {
    super(db);
  }

  async listProduction(userId: string): Promise<ProductionRecord[]> {
    const rows = await this.db
      .select()
      .from(produccionApicola)
      .where(eq(produccionApicola.authUserId, userId))
      .orderBy(desc(produccionApicola.createdAt));
    return rows.map(row => this.rowToProduction(row));
  }

  async listBotanicalOrigins(userId: string): Promise<BotanicalOrigin[]> {
    const rows = await this.db
      .select()
      .from(origenesBotanicos)
      .where(eq(origenesBotanicos.authUserId, userId));
    return rows.map(row => this.rowToOrigin(row));
  }

  async listRequests(userId: string): Promise<BeekeeperRequest[]> {
    const rows = await this.db
      .select()
      .from(solicitudesApicultor)
      .where(eq(solicitudesApicultor.authUserId, userId))
      .orderBy(desc(solicitudesApicultor.createdAt));
    return rows.map(row => this.rowToRequest(row));
  }

  private rowToProduction(row: ProduccionRow): ProductionRecord {
    return {
      id: row.id,
      temporada: row.temporada,
      cantidadKg: row.cantidadKg,
      descripcion: row.descripcion,
    };
  }

  private rowToOrigin(row: OrigenBotanicoRow): BotanicalOrigin {
    return {
      id: row.id,
      especie: row.especie,
      comuna: row.comuna,
      descripcion: row.descripcion,
    };
  }

  private rowToRequest(row: SolicitudRow): BeekeeperRequest {
    return {
      id: row.id,
      nombreCompleto: row.nombreCompleto,
      nombreEmpresa: row.nombreEmpresa,
      region: row.region,
      comuna: row.comuna,
      telefono: row.telefono,
      status: row.status,
      createdAt: row.createdAt,
    };
  }
}
