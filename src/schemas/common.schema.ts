// ============================================
// MELIAPP - Common Schemas
// ============================================

import { z } from 'zod';

// Short public form of a user id: its first 8 hex characters
export const UUID_SEGMENT_LENGTH = 8;

export const uuidSchema = z.string().uuid('Identificador inválido');

export const userIdParamSchema = z.object({
  userId: uuidSchema,
});

export const lotIdParamSchema = z.object({
  loteId: uuidSchema,
});

// Username, full UUID or 8-character UUID segment
export const identifierParamSchema = z.object({
  identifier: z.string().trim().min(1).max(80),
});

export const segmentParamSchema = z.object({
  segment: z.string()
    .length(UUID_SEGMENT_LENGTH, `El segmento debe tener ${UUID_SEGMENT_LENGTH} caracteres`)
    .regex(/^[0-9a-fA-F]+$/, 'El segmento debe ser hexadecimal'),
});

export const usernameSchema = z.string()
  .trim()
  .min(3, 'El nombre de usuario debe tener al menos 3 caracteres')
  .max(80, 'El nombre de usuario no puede superar 80 caracteres')
  .regex(/^[a-zA-Z0-9_-]+$/, 'El nombre de usuario solo puede contener letras, números, guiones y guiones bajos');

// Pagination schema
export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(20),
});

export const searchQuerySchema = z.object({
  q: z.string().trim().default(''),
  limit: z.coerce.number().int().min(1).max(50).default(5),
});

export const suggestQuerySchema = z.object({
  q: z.string().trim().default(''),
});

export const qrQuerySchema = z.object({
  format: z.enum(['png', 'json'], {
    errorMap: () => ({ message: 'Formato no soportado, usa png o json' }),
  }).default('png'),
  scale: z.coerce.number().int().min(1).max(40).optional(),
  t: z.string().optional(), // cache-buster, ignored
});

// Type exports
export type Pagination = z.infer<typeof paginationSchema>;
export type SearchQuery = z.infer<typeof searchQuerySchema>;
export type QrQuery = z.infer<typeof qrQuerySchema>;
