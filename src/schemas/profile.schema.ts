// ============================================
// MELIAPP - Profile Edit Schemas
// ============================================

import { z } from 'zod';
import { usernameSchema } from './common.schema.js';
import { USER_ROLES } from '../repositories/user.repository.js';

/**
 * Google Plus Code with locality, e.g. "4RFV+QX Chillán": exactly one "+",
 * at least 4 characters before it and a code of at least 2 after it.
 */
export function isPlusCode(value: string): boolean {
  const parts = value.trim().split('+');
  if (parts.length !== 2) return false;

  const [area, rest] = parts;
  const local = rest.trim().split(/\s+/)[0] ?? '';
  return area.trim().length >= 4 && local.length >= 2;
}

export const editUserSchema = z.object({
  username: usernameSchema.optional(),
  role: z.enum(USER_ROLES, {
    errorMap: () => ({ message: `Rol inválido, usa uno de: ${USER_ROLES.join(', ')}` }),
  }).optional(),
}).refine(data => data.username !== undefined || data.role !== undefined, {
  message: 'No se enviaron campos para actualizar',
});

export const editLocationSchema = z.object({
  ubicacion: z.string()
    .trim()
    .refine(isPlusCode, 'Ubicación inválida: usa un Plus Code de Google (ej. "4RFV+QX Chillán")'),
  nombre: z.string().trim().min(1).max(120).default('Apiario principal'),
  descripcion: z.string().trim().max(500).optional(),
  comuna: z.string().trim().min(1).max(120).optional(),
});

export const editContactSchema = z.object({
  nombre_completo: z.string().trim()
    .min(2, 'El nombre completo debe tener entre 2 y 150 caracteres')
    .max(150, 'El nombre completo debe tener entre 2 y 150 caracteres')
    .optional(),
  nombre_empresa: z.string().trim().max(150).optional(),
  correo_principal: z.string().trim().toLowerCase().email('Correo electrónico inválido').optional(),
  telefono_principal: z.string().trim().max(30).optional(),
  direccion: z.string().trim().max(250).optional(),
  comuna: z.string().trim().max(120).optional(),
  region: z.string().trim().max(120).optional(),
}).refine(data => Object.values(data).some(v => v !== undefined), {
  message: 'No se enviaron campos para actualizar',
});

export const ownDataTableParamSchema = z.object({
  table: z.enum(['usuarios', 'info_contacto', 'ubicaciones'], {
    errorMap: () => ({ message: 'Tabla no permitida' }),
  }),
});

// Type exports
export type EditUserInput = z.infer<typeof editUserSchema>;
export type EditLocationInput = z.infer<typeof editLocationSchema>;
export type EditContactInput = z.infer<typeof editContactSchema>;
