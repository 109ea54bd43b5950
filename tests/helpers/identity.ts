// ============================================
// MELIAPP - In-memory identity provider for tests
// ============================================

import { randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import { env } from '../../src/config/env.js';
import {
  AppError,
  ConflictError,
  UnauthorizedError,
} from '../../src/plugins/error-handler.plugin.js';
import type {
  IdentityProvider,
  IdentityResult,
  IdentitySession,
  OAuthProvider,
  SignUpMetadata,
} from '../../src/services/identity.provider.js';

interface StoredIdentity {
  id: string;
  email: string;
  password: string;
  metadata: Record<string, unknown>;
}

export function mintToken(userId: string, email: string | null, metadata: Record<string, unknown> = {}): string {
  return jwt.sign(
    { sub: userId, email: email ?? undefined, role: 'authenticated', user_metadata: metadata },
    env.SUPABASE_JWT_SECRET,
    { algorithm: 'HS256', expiresIn: '1h' }
  );
}

export class FakeIdentityProvider implements IdentityProvider {
  readonly users = new Map<string, StoredIdentity>();
  readonly resetRequests: string[] = [];
  readonly signOuts: string[] = [];
  readonly deletedUsers: string[] = [];
  /** When true, sign-up returns no session, as with e-mail confirmation on. */
  requireConfirmation = false;

  async signUp(email: string, password: string, metadata: SignUpMetadata): Promise<IdentityResult> {
    if (this.users.has(email)) {
      throw new ConflictError('El correo ya está registrado');
    }
    const identity: StoredIdentity = { id: randomUUID(), email, password, metadata: { ...metadata } };
    this.users.set(email, identity);

    return {
      user: { id: identity.id, email, metadata: identity.metadata },
      session: this.requireConfirmation ? null : this.sessionFor(identity),
    };
  }

  async signIn(email: string, password: string): Promise<IdentityResult & { session: IdentitySession }> {
    const identity = this.users.get(email);
    if (!identity || identity.password !== password) {
      throw new UnauthorizedError('Credenciales inválidas');
    }
    return {
      user: { id: identity.id, email, metadata: identity.metadata },
      session: this.sessionFor(identity),
    };
  }

  async signOut(accessToken: string): Promise<void> {
    this.signOuts.push(accessToken);
  }

  async sendPasswordReset(email: string): Promise<void> {
    this.resetRequests.push(email);
  }

  async updatePassword(accessToken: string, newPassword: string): Promise<void> {
    const identity = this.findByToken(accessToken);
    if (!identity) {
      throw new AppError('El enlace de recuperación no es válido o ha expirado', 400, 'AUTH_ERROR');
    }
    identity.password = newPassword;
  }

  async resendConfirmation(): Promise<void> {}

  async getOAuthUrl(provider: OAuthProvider, redirectTo: string): Promise<string> {
    return `https://auth.example.test/authorize?provider=${provider}&redirect_to=${encodeURIComponent(redirectTo)}`;
  }

  async deleteUser(userId: string): Promise<boolean> {
    for (const [email, identity] of this.users) {
      if (identity.id === userId) this.users.delete(email);
    }
    this.deletedUsers.push(userId);
    return true;
  }

  private sessionFor(identity: StoredIdentity): IdentitySession {
    return {
      accessToken: mintToken(identity.id, identity.email, identity.metadata),
      refreshToken: `refresh-${identity.id}`,
      expiresAt: Math.floor(Date.now() / 1000) + 3600,
    };
  }

  private findByToken(token: string): StoredIdentity | null {
    try {
      const claims = jwt.verify(token, env.SUPABASE_JWT_SECRET);
      const sub = typeof claims === 'object' ? claims.sub : undefined;
      return [...this.users.values()].find(u => u.id === sub) ?? null;
    } catch {
      return null;
    }
  }
}
