// ============================================
// MELIAPP - User Schema (Profile, Contact, Locations, Production)
// ============================================

import {
  pgTable,
  uuid,
  text,
  boolean,
  timestamp,
  doublePrecision,
  index,
} from 'drizzle-orm/pg-core';

// One row per identity-provider subject, mirrored on registration
export const usuarios = pgTable('usuarios', {
  authUserId: uuid('auth_user_id').primaryKey(),
  username: text('username').notNull().unique(),
  tipoUsuario: text('tipo_usuario').notNull().default('Regular'),
  role: text('role').notNull().default('APICULTOR'), // UserRole
  status: text('status').notNull().default('active'),
  activo: boolean('activo').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const infoContacto = pgTable('info_contacto', {
  id: uuid('id').primaryKey().defaultRandom(),
  authUserId: uuid('auth_user_id')
    .notNull()
    .unique()
    .references(() => usuarios.authUserId, { onDelete: 'cascade' }),
  nombreCompleto: text('nombre_completo'),
  nombreEmpresa: text('nombre_empresa'),
  correoPrincipal: text('correo_principal'),
  telefonoPrincipal: text('telefono_principal'),
  direccion: text('direccion'),
  comuna: text('comuna'),
  region: text('region'),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const ubicaciones = pgTable('ubicaciones', {
  id: uuid('id').primaryKey().defaultRandom(),
  authUserId: uuid('auth_user_id')
    .notNull()
    .references(() => usuarios.authUserId, { onDelete: 'cascade' }),
  nombre: text('nombre').notNull(),
  descripcion: text('descripcion'),
  normaGeo: text('norma_geo').notNull(), // Plus Code
  comuna: text('comuna'),
  latitud: doublePrecision('latitud'),
  longitud: doublePrecision('longitud'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_ubicaciones_user').on(table.authUserId),
]);

export const produccionApicola = pgTable('produccion_apicola', {
  id: uuid('id').primaryKey().defaultRandom(),
  authUserId: uuid('auth_user_id')
    .notNull()
    .references(() => usuarios.authUserId, { onDelete: 'cascade' }),
  temporada: text('temporada').notNull(),
  cantidadKg: doublePrecision('cantidad_kg').notNull().default(0),
  descripcion: text('descripcion'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_produccion_user').on(table.authUserId),
]);

export const origenesBotanicos = pgTable('origenes_botanicos', {
  id: uuid('id').primaryKey().defaultRandom(),
  authUserId: uuid('auth_user_id')
    .notNull()
    .references(() => usuarios.authUserId, { onDelete: 'cascade' }),
  especie: text('especie').notNull(),
  comuna: text('comuna'),
  descripcion: text('descripcion'),
}, (table) => [
  index('idx_origenes_user').on(table.authUserId),
]);

export const solicitudesApicultor = pgTable('solicitudes_apicultor', {
  id: uuid('id').primaryKey().defaultRandom(),
  authUserId: uuid('auth_user_id')
    .notNull()
    .references(() => usuarios.authUserId, { onDelete: 'cascade' }),
  nombreCompleto: text('nombre_completo').notNull(),
  nombreEmpresa: text('nombre_empresa'),
  region: text('region'),
  comuna: text('comuna'),
  telefono: text('telefono'),
  status: text('status').notNull().default('pendiente'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_solicitudes_user').on(table.authUserId),
]);

// Type exports
export type UsuarioRow = typeof usuarios.$inferSelect;
export type UsuarioInsert = typeof usuarios.$inferInsert;

export type InfoContactoRow = typeof infoContacto.$inferSelect;
export type InfoContactoInsert = typeof infoContacto.$inferInsert;

export type UbicacionRow = typeof ubicaciones.$inferSelect;
export type UbicacionInsert = typeof ubicaciones.$inferInsert;

export type ProduccionRow = typeof produccionApicola.$inferSelect;
export type OrigenBotanicoRow = typeof origenesBotanicos.$inferSelect;
export type SolicitudRow = typeof solicitudesApicultor.$inferSelect;
