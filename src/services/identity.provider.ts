// ============================================
// MELIAPP - Identity Provider (hosted auth)
// ============================================

import {
  GoTrueClient,
  isAuthApiError,
  isAuthRetryableFetchError,
  isAuthWeakPasswordError,
  type AuthError,
  type Session,
  type User as SupabaseUser,
} from '@supabase/auth-js';
import { z } from 'zod';
import { env } from '../config/env.js';
import {
  AppError,
  ConflictError,
  ServiceUnavailableError,
  UnauthorizedError,
  ValidationError,
} from '../plugins/error-handler.plugin.js';

export interface IdentityUser {
  id: string;
  email: string | null;
  metadata: Record<string, unknown>;
}

export interface IdentitySession {
  accessToken: string;
  refreshToken: string;
  expiresAt: number | null;
}

export interface IdentityResult {
  user: IdentityUser;
  session: IdentitySession | null;
}

export interface SignUpMetadata {
  username: string;
  full_name: string | null;
  company: string | null;
}

export type OAuthProvider = 'google';

/**
 * Everything the app asks of the hosted auth service. Failures surface as
 * AppError subclasses so controllers never see provider error shapes.
 */
export interface IdentityProvider {
  signUp(email: string, password: string, metadata: SignUpMetadata, redirectTo: string): Promise<IdentityResult>;
  signIn(email: string, password: string): Promise<IdentityResult & { session: IdentitySession }>;
  signOut(accessToken: string): Promise<void>;
  sendPasswordReset(email: string, redirectTo: string): Promise<void>;
  updatePassword(accessToken: string, newPassword: string): Promise<void>;
  resendConfirmation(email: string, redirectTo: string): Promise<void>;
  getOAuthUrl(provider: OAuthProvider, redirectTo: string): Promise<string>;
  /** Returns false when the provider was not configured with admin rights. */
  deleteUser(userId: string): Promise<boolean>;
}

function toIdentityUser(user: SupabaseUser): IdentityUser {
  return {
    id: user.id,
    email: user.email ?? null,
    metadata: user.user_metadata,
  };
}

function toIdentitySession(session: Session): IdentitySession {
  return {
    accessToken: session.access_token,
    refreshToken: session.refresh_token,
    expiresAt: session.expires_at ?? null,
  };
}

function toAppError(error: AuthError, fallback: string): AppError {
  if (isAuthRetryableFetchError(error)) {
    return new ServiceUnavailableError();
  }
  if (isAuthWeakPasswordError(error)) {
    return new ValidationError('La contraseña es demasiado débil', error.reasons);
  }
  if (error.code === 'invalid_credentials' || error.message === 'Invalid login credentials') {
    return new UnauthorizedError('Credenciales inválidas');
  }
  if (error.code === 'email_not_confirmed' || error.message === 'Email not confirmed') {
    return new UnauthorizedError('Debes confirmar tu correo antes de iniciar sesión');
  }
  if (error.code === 'user_already_exists' || error.message === 'User already registered') {
    return new ConflictError('El correo ya está registrado');
  }
  if (isAuthApiError(error) && error.status === 429) {
    return new AppError('Demasiados intentos, espera unos minutos', 429, 'RATE_LIMITED');
  }
  return new AppError(fallback, 400, 'AUTH_ERROR');
}

// Error body of the auth REST API (only the fields read here)
const authErrorBodySchema = z.object({
  error_code: z.string().optional(),
  weak_password: z.object({ reasons: z.array(z.string()) }).optional(),
});

export type FetchFn = typeof fetch;

export interface SupabaseIdentityOptions {
  url?: string;
  anonKey?: string;
  /** Only needed to roll back a registration whose profile could not be stored. */
  serviceRoleKey?: string;
  fetch?: FetchFn;
}

function authClient(authUrl: string, key: string, fetchFn: FetchFn): GoTrueClient {
  return new GoTrueClient({
    url: authUrl,
    headers: { apikey: key, Authorization: `Bearer ${key}` },
    persistSession: false,
    autoRefreshToken: false,
    detectSessionInUrl: false,
    flowType: 'implicit',
    fetch: fetchFn,
  });
}

/**
 * Talks to the hosted auth REST API only; no realtime socket is opened, so
 * nothing here depends on a global WebSocket.
 */
export class SupabaseIdentityProvider implements IdentityProvider {
  private client: GoTrueClient;
  private admin: GoTrueClient | null;
  private authUrl: string;
  private anonKey: string;
  private fetchFn: FetchFn;

  constructor(options: SupabaseIdentityOptions = {}) {
    this.authUrl = `${(options.url ?? env.SUPABASE_URL).replace(/\/+$/, '')}/auth/v1`;
    this.anonKey = options.anonKey ?? env.SUPABASE_ANON_KEY;
    this.fetchFn = options.fetch ?? ((input: string | URL | Request, init?: RequestInit) => fetch(input, init));

    const serviceRoleKey = 'serviceRoleKey' in options ? options.serviceRoleKey : env.SUPABASE_SERVICE_ROLE_KEY;
    this.client = authClient(this.authUrl, this.anonKey, this.fetchFn);
    this.admin = serviceRoleKey ? authClient(this.authUrl, serviceRoleKey, this.fetchFn) : null;
  }

  async signUp(email: string, password: string, metadata: SignUpMetadata, redirectTo: string): Promise<IdentityResult> {
    const { data, error } = await this.client.signUp({
      email,
      password,
      options: { data: { ...metadata }, emailRedirectTo: redirectTo },
    });
    if (error) throw toAppError(error, 'No se pudo completar el registro');
    if (!data.user) throw new AppError('No se pudo completar el registro', 400, 'AUTH_ERROR');

    return {
      user: toIdentityUser(data.user),
      session: data.session ? toIdentitySession(data.session) : null,
    };
  }

  async signIn(email: string, password: string): Promise<IdentityResult & { session: IdentitySession }> {
    const { data, error } = await this.client.signInWithPassword({ email, password });
    if (error) throw toAppError(error, 'No se pudo iniciar sesión');

    return {
      user: toIdentityUser(data.user),
      session: toIdentitySession(data.session),
    };
  }

  async signOut(accessToken: string): Promise<void> {
    const { error } = await this.client.admin.signOut(accessToken);
    if (error) throw toAppError(error, 'No se pudo cerrar la sesión');
  }

  async sendPasswordReset(email: string, redirectTo: string): Promise<void> {
    const { error } = await this.client.resetPasswordForEmail(email, { redirectTo });
    if (error) throw toAppError(error, 'No se pudo enviar el correo de recuperación');
  }

  /**
   * The recovery (or access) token authorizes its own password change:
   * PUT /user with the user's bearer, no admin rights involved.
   */
  async updatePassword(accessToken: string, newPassword: string): Promise<void> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.authUrl}/user`, {
        method: 'PUT',
        headers: {
          apikey: this.anonKey,
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ password: newPassword }),
      });
    } catch {
      throw new ServiceUnavailableError();
    }
    if (res.ok) return;

    const parsed = authErrorBodySchema.safeParse(await res.json().catch(() => null));
    const body: z.infer<typeof authErrorBodySchema> = parsed.success ? parsed.data : {};

    if (res.status === 401 || res.status === 403) {
      throw new ValidationError('Token inválido o expirado. Solicita un nuevo enlace de recuperación.');
    }
    if (body.error_code === 'weak_password' || body.weak_password) {
      throw new ValidationError('La contraseña es demasiado débil', body.weak_password?.reasons);
    }
    if (body.error_code === 'same_password') {
      throw new ValidationError('La nueva contraseña debe ser distinta de la actual');
    }
    if (res.status === 429) {
      throw new AppError('Demasiados intentos, espera unos minutos', 429, 'RATE_LIMITED');
    }
    if (res.status >= 500) {
      throw new ServiceUnavailableError();
    }
    throw new AppError('No se pudo actualizar la contraseña', 400, 'AUTH_ERROR');
  }

  async resendConfirmation(email: string, redirectTo: string): Promise<void> {
    const { error } = await this.client.resend({
      type: 'signup',
      email,
      options: { emailRedirectTo: redirectTo },
    });
    if (error) throw toAppError(error, 'No se pudo reenviar el correo de confirmación');
  }

  async getOAuthUrl(provider: OAuthProvider, redirectTo: string): Promise<string> {
    const { data, error } = await this.client.signInWithOAuth({
      provider,
      options: { redirectTo, skipBrowserRedirect: true },
    });
    if (error) throw toAppError(error, 'No se pudo iniciar el acceso con Google');
    if (!data.url) throw new ServiceUnavailableError();
    return data.url;
  }

  async deleteUser(userId: string): Promise<boolean> {
    if (!this.admin) return false;
    const { error } = await this.admin.admin.deleteUser(userId);
    if (error) throw toAppError(error, 'No se pudo eliminar el usuario');
    return true;
  }
}
