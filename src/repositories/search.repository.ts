// ============================================
// MELIAPP - Search Repository
// ============================================

import { ilike, or, sql } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import {
  usuarios,
  infoContacto,
  ubicaciones,
  origenesBotanicos,
  solicitudesApicultor,
} from '../db/schema/users.js';
import { lotes } from '../db/schema/lots.js';
import type { DrizzleDb } from '../db/drizzle.js';

export const SEARCHABLE_TABLES = [
  'usuarios',
  'info_contacto',
  'ubicaciones',
  'origenes_botanicos',
  'solicitudes_apicultor',
  'lotes',
] as const;
export type SearchableTable = typeof SEARCHABLE_TABLES[number];

export interface SearchHit {
  table: SearchableTable;
  id: string;
  userId: string;
  title: string;
  subtitle: string | null;
}

type TableSearch = (pattern: string, limit: number) => Promise<SearchHit[]>;

export class SearchRepository extends BaseRepository {
  private readonly searches: Record<SearchableTable, TableSearch>;

  constructor(db: DrizzleDb) {
    super(db);
    this.searches = {
      usuarios: (pattern, limit) => this.searchUsers(pattern, limit),
      info_contacto: (pattern, limit) => this.searchContacts(pattern, limit),
      ubicaciones: (pattern, limit) => this.searchLocations(pattern, limit),
      origenes_botanicos: (pattern, limit) => this.searchOrigins(pattern, limit),
      solicitudes_apicultor: (pattern, limit) => this.searchRequests(pattern, limit),
      lotes: (pattern, limit) => this.searchLots(pattern, limit),
    };
  }

  async search(table: SearchableTable, term: string, limit: number): Promise<SearchHit[]> {
    return this.searches[table](this.containsPattern(term), limit);
  }

  private async searchUsers(pattern: string, limit: number): Promise<SearchHit[]> {
    const rows = await this.db
      .select()
      .from(usuarios)
      .where(or(
        ilike(sql`${usuarios.authUserId}::text`, pattern),
        ilike(usuarios.username, pattern),
        ilike(usuarios.tipoUsuario, pattern),
        ilike(usuarios.role, pattern),
        ilike(usuarios.status, pattern),
      ))
      .limit(limit);
    return rows.map((row): SearchHit => ({
      table: 'usuarios',
      id: row.authUserId,
      userId: row.authUserId,
      title: row.username,
      subtitle: row.role,
    }));
  }

  private async searchContacts(pattern: string, limit: number): Promise<SearchHit[]> {
    const rows = await this.db
      .select()
      .from(infoContacto)
      .where(or(
        ilike(infoContacto.nombreCompleto, pattern),
        ilike(infoContacto.nombreEmpresa, pattern),
        ilike(infoContacto.correoPrincipal, pattern),
        ilike(infoContacto.telefonoPrincipal, pattern),
        ilike(infoContacto.direccion, pattern),
        ilike(infoContacto.comuna, pattern),
      ))
      .limit(limit);
    return rows.map((row): SearchHit => ({
      table: 'info_contacto',
      id: row.id,
      userId: row.authUserId,
      title: row.nombreCompleto ?? row.nombreEmpresa ?? row.authUserId,
      subtitle: row.comuna,
    }));
  }

  private async searchLocations(pattern: string, limit: number): Promise<SearchHit[]> {
    const rows = await this.db
      .select()
      .from(ubicaciones)
      .where(or(
        ilike(ubicaciones.nombre, pattern),
        ilike(ubicaciones.descripcion, pattern),
        ilike(ubicaciones.normaGeo, pattern),
        ilike(ubicaciones.comuna, pattern),
      ))
      .limit(limit);
    return rows.map((row): SearchHit => ({
      table: 'ubicaciones',
      id: row.id,
      userId: row.authUserId,
      title: row.nombre,
      subtitle: row.comuna ?? row.normaGeo,
    }));
  }

  private async searchOrigins(pattern: string, limit: number): Promise<SearchHit[]> {
    const rows = await this.db
      .select()
      .from(origenesBotanicos)
      .where(or(
        ilike(origenesBotanicos.especie, pattern),
        ilike(origenesBotanicos.comuna, pattern),
        ilike(origenesBotanicos.descripcion, pattern),
      ))
      .limit(limit);
    return rows.map((row): SearchHit => ({
      table: 'origenes_botanicos',
      id: row.id,
      userId: row.authUserId,
      title: row.especie,
      subtitle: row.comuna,
    }));
  }

  private async searchRequests(pattern: string, limit: number): Promise<SearchHit[]> {
    const rows = await this.db
      .select()
      .from(solicitudesApicultor)
      .where(or(
        ilike(solicitudesApicultor.nombreCompleto, pattern),
        ilike(solicitudesApicultor.nombreEmpresa, pattern),
        ilike(solicitudesApicultor.region, pattern),
        ilike(solicitudesApicultor.comuna, pattern),
        ilike(solicitudesApicultor.telefono, pattern),
        ilike(solicitudesApicultor.status, pattern),
      ))
      .limit(limit);
    return rows.map((row): SearchHit => ({
      table: 'solicitudes_apicultor',
      id: row.id,
      userId: row.authUserId,
      title: row.nombreCompleto,
      subtitle: row.nombreEmpresa ?? row.comuna,
    }));
  }

  private async searchLots(pattern: string, limit: number): Promise<SearchHit[]> {
    const rows = await this.db
      .select()
      .from(lotes)
      .where(ilike(lotes.nombreMiel, pattern))
      .limit(limit);
    return rows.map((row): SearchHit => ({
      table: 'lotes',
      id: row.id,
      userId: row.authUserId,
      title: row.nombreMiel,
      subtitle: `${row.anio} · temporada ${row.temporada}`,
    }));
  }
}
