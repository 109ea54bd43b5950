// ============================================
// MELIAPP - Lot Schemas
// ============================================

import { z } from 'zod';
import { parseCompositionStrict, parsePercentage, type Composition } from '../shared/composition.js';
import { uuidSchema } from './common.schema.js';

// Either the wire string ("Ulmo:40,Quillay:60") or a species -> percentage map
export const compositionInputSchema = z
  .union([z.string(), z.record(z.string(), z.unknown())], {
    errorMap: () => ({ message: 'La composición debe ser texto "especie:porcentaje" o un mapa de especies' }),
  })
  .transform((input, ctx): Composition => {
    if (typeof input === 'string') {
      const { composition, malformed } = parseCompositionStrict(input);
      if (malformed.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Par de composición inválido: "${malformed[0]}"`,
          params: { malformed },
        });
        return z.NEVER;
      }
      return composition;
    }

    const composition: Composition = {};
    for (const [species, value] of Object.entries(input)) {
      const percentage = parsePercentage(value);
      if (percentage === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `El porcentaje de ${species} debe ser numérico`,
          path: [species],
        });
        return z.NEVER;
      }
      composition[species] = percentage;
    }
    return composition;
  });

export const lotFieldsSchema = z.object({
  nombre_miel: z.string({ required_error: 'El nombre de la miel es requerido' })
    .trim()
    .min(2, 'El nombre de la miel debe tener al menos 2 caracteres')
    .max(120, 'El nombre de la miel no puede superar 120 caracteres'),
  temporada: z.coerce.number({ invalid_type_error: 'La temporada debe ser 1, 2, 3 o 4' })
    .int('La temporada debe ser 1, 2, 3 o 4')
    .min(1, 'La temporada debe ser 1, 2, 3 o 4')
    .max(4, 'La temporada debe ser 1, 2, 3 o 4'),
  anio: z.coerce.number({ invalid_type_error: 'El año debe ser numérico' })
    .int('El año debe ser numérico')
    .min(1900, 'Año fuera de rango')
    .max(2100, 'Año fuera de rango'),
  kg_producidos: z.coerce.number({ invalid_type_error: 'Los kg producidos deben ser numéricos' })
    .min(0, 'Los kg producidos no pueden ser negativos')
    .default(0),
  composicion_polen: compositionInputSchema.optional(),
});

// Create-or-update in one endpoint: presence of lote_id means update
export const manageLotSchema = lotFieldsSchema.extend({
  lote_id: uuidSchema.optional(),
});

export const reorderLotsSchema = z.object({
  orden: z.array(uuidSchema).min(1, 'Debes enviar el orden completo de los lotes'),
});

export const compositionUpdateSchema = z.object({
  composicion: compositionInputSchema,
});

// Type exports
export type LotFieldsInput = z.infer<typeof lotFieldsSchema>;
export type ManageLotInput = z.infer<typeof manageLotSchema>;
export type ReorderLotsInput = z.infer<typeof reorderLotsSchema>;
