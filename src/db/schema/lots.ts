// ============================================
// MELIAPP - Lot Schema (Lots, Composition, Clicks)
// ============================================

import {
  pgTable,
  uuid,
  text,
  integer,
  smallint,
  doublePrecision,
  timestamp,
  index,
  uniqueIndex,
  primaryKey,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { usuarios } from './users.js';

export const lotes = pgTable('lotes', {
  id: uuid('id').primaryKey().defaultRandom(),
  authUserId: uuid('auth_user_id')
    .notNull()
    .references(() => usuarios.authUserId, { onDelete: 'cascade' }),
  nombreMiel: text('nombre_miel').notNull(),
  temporada: smallint('temporada').notNull(), // 1..4
  anio: integer('anio').notNull(),
  kgProducidos: doublePrecision('kg_producidos').notNull().default(0),
  ordenMiel: integer('orden_miel').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_lotes_user').on(table.authUserId),
  uniqueIndex('uq_lotes_user_orden').on(table.authUserId, table.ordenMiel),
  check('lotes_temporada_check', sql`${table.temporada} BETWEEN 1 AND 4`),
]);

// species -> percentage, one row per species
export const loteComposicion = pgTable('lote_composicion', {
  loteId: uuid('lote_id')
    .notNull()
    .references(() => lotes.id, { onDelete: 'cascade' }),
  especie: text('especie').notNull(),
  porcentaje: doublePrecision('porcentaje').notNull(),
}, (table) => [
  primaryKey({ columns: [table.loteId, table.especie] }),
  check('lote_composicion_porcentaje_check', sql`${table.porcentaje} >= 0 AND ${table.porcentaje} <= 100`),
]);

export const loteClicks = pgTable('lote_clicks', {
  id: uuid('id').primaryKey(),
  loteId: uuid('lote_id')
    .notNull()
    .references(() => lotes.id, { onDelete: 'cascade' }),
  viewerId: uuid('viewer_id'), // null for anonymous visitors
  clickedAt: timestamp('clicked_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_lote_clicks_lote').on(table.loteId),
]);

// Type exports
export type LoteRow = typeof lotes.$inferSelect;
export type LoteInsert = typeof lotes.$inferInsert;

export type LoteComposicionRow = typeof loteComposicion.$inferSelect;
export type LoteComposicionInsert = typeof loteComposicion.$inferInsert;

export type LoteClickRow = typeof loteClicks.$inferSelect;
export type LoteClickInsert = typeof loteClicks.$inferInsert;
