// ============================================
// MELIAPP - User Repository (usuarios + info_contacto)
// ============================================

import { and, asc, eq, ilike, ne, sql } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import {
  usuarios,
  infoContacto,
  type UsuarioRow,
  type InfoContactoRow,
} from '../db/schema/users.js';
import type { DrizzleDb } from '../db/drizzle.js';

export const USER_ROLES = ['APICULTOR', 'PROVEEDOR', 'PRESTADOR DE SERVICIOS'] as const;
export type UserRole = typeof USER_ROLES[number];

export interface User {
  id: string;
  username: string;
  tipoUsuario: string;
  role: string;
  status: string;
  activo: boolean;
  createdAt: Date;
}

export interface ContactInfo {
  nombreCompleto: string | null;
  nombreEmpresa: string | null;
  correoPrincipal: string | null;
  telefonoPrincipal: string | null;
  direccion: string | null;
  comuna: string | null;
  region: string | null;
}

export interface UserWithContact {
  user: User;
  contact: ContactInfo | null;
}

export interface NewProfile {
  id: string;
  username: string;
  email: string | null;
  nombreCompleto: string | null;
  nombreEmpresa: string | null;
  role?: UserRole;
}

export class UserRepository extends BaseRepository {
  constructor(db: DrizzleDb) {
    super(db);
  }

  async getUser(id: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(usuarios)
      .where(eq(usuarios.authUserId, id))
      .limit(1);
    const row = this.first(rows);
    return row ? this.rowToUser(row) : null;
  }

  async getUserByUsername(username: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(usuarios)
      .where(eq(usuarios.username, username))
      .limit(1);
    const row = this.first(rows);
    return row ? this.rowToUser(row) : null;
  }

  // `prefix` must already be validated as hexadecimal
  async getUserByIdPrefix(prefix: string): Promise<User | null> {
    const rows = await this.db
      .select()
      .from(usuarios)
      .where(ilike(sql`${usuarios.authUserId}::text`, `${prefix.toLowerCase()}%`))
      .orderBy(asc(usuarios.createdAt))
      .limit(1);
    const row = this.first(rows);
    return row ? this.rowToUser(row) : null;
  }

  async searchByUsername(term: string, limit: number): Promise<User[]> {
    const rows = await this.db
      .select()
      .from(usuarios)
      .where(ilike(usuarios.username, this.containsPattern(term)))
      .orderBy(asc(usuarios.username))
      .limit(limit);
    return rows.map(row => this.rowToUser(row));
  }

  async searchByContactName(term: string, limit: number): Promise<UserWithContact[]> {
    const rows = await this.db
      .select({ user: usuarios, contact: infoContacto })
      .from(infoContacto)
      .innerJoin(usuarios, eq(usuarios.authUserId, infoContacto.authUserId))
      .where(ilike(infoContacto.nombreCompleto, this.containsPattern(term)))
      .orderBy(asc(infoContacto.nombreCompleto))
      .limit(limit);
    return rows.map(row => ({
      user: this.rowToUser(row.user),
      contact: this.rowToContact(row.contact),
    }));
  }

  async isUsernameTaken(username: string, exceptUserId?: string): Promise<boolean> {
    const condition = exceptUserId
      ? and(eq(usuarios.username, username), ne(usuarios.authUserId, exceptUserId))
      : eq(usuarios.username, username);
    const rows = await this.db
      .select({ id: usuarios.authUserId })
      .from(usuarios)
      .where(condition)
      .limit(1);
    return rows.length > 0;
  }

  /**
   * Creates the profile and contact rows for a new identity. Existing rows
   * are left untouched so repeated OAuth callbacks are harmless.
   */
  async createProfile(profile: NewProfile): Promise<User> {
    return this.inTransaction(async (tx) => {
      await tx
        .insert(usuarios)
        .values({
          authUserId: profile.id,
          username: profile.username,
          role: profile.role ?? 'APICULTOR',
          tipoUsuario: 'Regular',
        })
        .onConflictDoNothing({ target: usuarios.authUserId });

      await tx
        .insert(infoContacto)
        .values({
          authUserId: profile.id,
          nombreCompleto: profile.nombreCompleto,
          nombreEmpresa: profile.nombreEmpresa,
          correoPrincipal: profile.email,
        })
        .onConflictDoNothing({ target: infoContacto.authUserId });

      const rows = await tx
        .select()
        .from(usuarios)
        .where(eq(usuarios.authUserId, profile.id))
        .limit(1);
      return this.rowToUser(rows[0]);
    });
  }

  async updateUser(
    id: string,
    patch: { username?: string; role?: UserRole; tipoUsuario?: string }
  ): Promise<User | null> {
    const rows = await this.db
      .update(usuarios)
      .set(patch)
      .where(eq(usuarios.authUserId, id))
      .returning();
    const row = this.first(rows);
    return row ? this.rowToUser(row) : null;
  }

  async getContact(userId: string): Promise<ContactInfo | null> {
    const rows = await this.db
      .select()
      .from(infoContacto)
      .where(eq(infoContacto.authUserId, userId))
      .limit(1);
    const row = this.first(rows);
    return row ? this.rowToContact(row) : null;
  }

  async upsertContact(userId: string, patch: Partial<ContactInfo>): Promise<ContactInfo> {
    const rows = await this.db
      .insert(infoContacto)
      .values({ ...patch, authUserId: userId, updatedAt: this.now() })
      .onConflictDoUpdate({
        target: infoContacto.authUserId,
        set: { ...patch, updatedAt: this.now() },
      })
      .returning();
    return this.rowToContact(rows[0]);
  }

  private rowToUser(row: UsuarioRow): User {
    return {
      id: row.authUserId,
      username: row.username,
      tipoUsuario: row.tipoUsuario,
      role: row.role,
      status: row.status,
      activo: row.activo,
      createdAt: row.createdAt,
    };
  }

  private rowToContact(row: InfoContactoRow): ContactInfo {
    return {
      nombreCompleto: row.nombreCompleto,
      nombreEmpresa: row.nombreEmpresa,
      correoPrincipal: row.correoPrincipal,
      telefonoPrincipal: row.telefonoPrincipal,
      direccion: row.direccion,
      comuna: row.comuna,
      region: row.region,
    };
  }
}
