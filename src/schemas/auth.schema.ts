// ============================================
// MELIAPP - Auth Schemas
// ============================================

import { z } from 'zod';
import { usernameSchema } from './common.schema.js';

const passwordSchema = z.string()
  .min(6, 'La contraseña debe tener al menos 6 caracteres')
  .max(128, 'La contraseña no puede superar 128 caracteres');

const emailSchema = z.string().trim().toLowerCase().email('Correo electrónico inválido');

// Register schema
export const registerSchema = z.object({
  email: emailSchema,
  password: passwordSchema,
  username: usernameSchema,
  full_name: z.string().trim().min(2).max(150).optional(),
  company: z.string().trim().max(150).optional(),
});

// Login schema
export const loginSchema = z.object({
  email: emailSchema,
  password: z.string().min(1, 'La contraseña es requerida'),
});

export const emailOnlySchema = z.object({
  email: emailSchema,
});

export const resetPasswordSchema = z.object({
  token: z.string().min(1, 'Token y contraseña son requeridos'),
  password: passwordSchema,
});

// Change password schema
export const changePasswordSchema = z.object({
  current_password: z.string().min(1, 'La contraseña actual es requerida'),
  new_password: passwordSchema,
});

// Tokens handed over by the OAuth callback page
export const oauthTokensSchema = z.object({
  access_token: z.string().min(1, 'Token de acceso requerido'),
  refresh_token: z.string().optional(),
});

// Type exports
export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type ResetPasswordInput = z.infer<typeof resetPasswordSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
export type OAuthTokensInput = z.infer<typeof oauthTokensSchema>;
