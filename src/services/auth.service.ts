// ============================================
// MELIAPP - Auth Service
// ============================================

import type { FastifyBaseLogger } from 'fastify';
import { UserRepository, type User, type ContactInfo } from '../repositories/user.repository.js';
import { blacklistToken, type AuthenticatedUser } from '../plugins/auth.plugin.js';
import {
  AppError,
  ConflictError,
  NotFoundError,
  ServiceUnavailableError,
  UnauthorizedError,
} from '../plugins/error-handler.plugin.js';
import { env } from '../config/env.js';
import type { IdentityProvider, IdentitySession } from './identity.provider.js';
import type { RegisterInput } from '../schemas/auth.schema.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface Account {
  id: string;
  username: string;
  email: string | null;
  role: string;
  nombreCompleto: string | null;
  nombreEmpresa: string | null;
}

export interface AuthResult {
  account: Account;
  session: IdentitySession | null;
}

const USERNAME_MAX = 80;

export class AuthService {
  private userRepo: UserRepository;

  constructor(
    db: DrizzleDb,
    private identity: IdentityProvider,
    private log: FastifyBaseLogger
  ) {
    this.userRepo = new UserRepository(db);
  }

  async register(input: RegisterInput): Promise<AuthResult> {
    if (await this.userRepo.isUsernameTaken(input.username)) {
      throw new ConflictError('El nombre de usuario ya está en uso');
    }

    const { user: identityUser, session } = await this.identity.signUp(
      input.email,
      input.password,
      { username: input.username, full_name: input.full_name ?? null, company: input.company ?? null },
      `${env.PUBLIC_BASE_URL}/login`
    );

    try {
      const user = await this.userRepo.createProfile({
        id: identityUser.id,
        username: input.username,
        email: input.email,
        nombreCompleto: input.full_name ?? null,
        nombreEmpresa: input.company ?? null,
      });
      const contact = await this.userRepo.getContact(user.id);
      return { account: this.toAccount(user, contact, input.email), session };
    } catch (err) {
      this.log.error({ err, userId: identityUser.id }, '[AuthService] Profile mirror failed after sign-up');
      await this.rollbackIdentity(identityUser.id);
      throw new AppError('No se pudo crear el perfil de usuario', 500, 'PROFILE_CREATION_FAILED');
    }
  }

  async login(email: string, password: string): Promise<AuthResult & { session: IdentitySession }> {
    const { user: identityUser, session } = await this.identity.signIn(email, password);

    const user = await this.userRepo.getUser(identityUser.id);
    if (!user) {
      throw new NotFoundError('Perfil de usuario no encontrado');
    }
    const contact = await this.userRepo.getContact(user.id);
    return { account: this.toAccount(user, contact, identityUser.email), session };
  }

  // The local revocation always happens; the provider call is best-effort
  async logout(user: AuthenticatedUser): Promise<void> {
    blacklistToken(user.token, user.expiresAt);
    try {
      await this.identity.signOut(user.token);
    } catch (err) {
      this.log.warn({ err, userId: user.userId }, '[AuthService] Provider sign-out failed');
    }
  }

  async getAccount(userId: string, email: string | null): Promise<Account | null> {
    const user = await this.userRepo.getUser(userId);
    if (!user) return null;
    const contact = await this.userRepo.getContact(userId);
    return this.toAccount(user, contact, email);
  }

  /**
   * Never reveals whether the address is registered; only an unreachable
   * provider is reported to the caller.
   */
  async requestPasswordReset(email: string): Promise<void> {
    try {
      await this.identity.sendPasswordReset(email, `${env.PUBLIC_BASE_URL}/reset-password`);
    } catch (err) {
      if (err instanceof ServiceUnavailableError) throw err;
      this.log.warn({ err }, '[AuthService] Password reset request rejected by provider');
    }
  }

  async resetPassword(recoveryToken: string, newPassword: string): Promise<void> {
    await this.identity.updatePassword(recoveryToken, newPassword);
  }

  async changePassword(user: AuthenticatedUser, currentPassword: string, newPassword: string): Promise<void> {
    if (!user.email) {
      throw new AppError('Esta cuenta no usa contraseña', 400, 'PASSWORD_NOT_SET');
    }

    try {
      await this.identity.signIn(user.email, currentPassword);
    } catch (err) {
      if (err instanceof UnauthorizedError) {
        throw new UnauthorizedError('La contraseña actual es incorrecta');
      }
      throw err;
    }

    await this.identity.updatePassword(user.token, newPassword);
  }

  async resendConfirmation(email: string): Promise<void> {
    await this.identity.resendConfirmation(email, `${env.PUBLIC_BASE_URL}/login`);
  }

  async getGoogleAuthUrl(): Promise<string> {
    return this.identity.getOAuthUrl('google', `${env.PUBLIC_BASE_URL}/auth/callback`);
  }

  /**
   * First visit after an OAuth sign-in: mirrors the profile rows when the
   * identity has none yet.
   */
  async completeOAuth(user: AuthenticatedUser): Promise<Account> {
    const existing = await this.getAccount(user.userId, user.email);
    if (existing) return existing;

    const fullName = readString(user.metadata, 'full_name') ?? readString(user.metadata, 'name');
    const username = await this.deriveUsername(user.email, user.userId);
    const created = await this.userRepo.createProfile({
      id: user.userId,
      username,
      email: user.email,
      nombreCompleto: fullName,
      nombreEmpresa: null,
    });
    this.log.info({ userId: user.userId, username }, '[AuthService] Profile created from OAuth identity');

    const contact = await this.userRepo.getContact(created.id);
    return this.toAccount(created, contact, user.email);
  }

  private async deriveUsername(email: string | null, userId: string): Promise<string> {
    const local = (email ?? '').split('@')[0].replace(/[^a-zA-Z0-9_-]/g, '');
    const base = (local.length >= 3 ? local : `apicultor_${local}`).slice(0, USERNAME_MAX - 9);
    if (!(await this.userRepo.isUsernameTaken(base))) {
      return base;
    }
    return `${base}_${userId.slice(0, 8)}`;
  }

  private async rollbackIdentity(userId: string): Promise<void> {
    try {
      const deleted = await this.identity.deleteUser(userId);
      if (!deleted) {
        this.log.warn({ userId }, '[AuthService] No admin key configured, identity left without profile');
      }
    } catch (err) {
      this.log.error({ err, userId }, '[AuthService] Identity rollback failed');
    }
  }

  private toAccount(user: User, contact: ContactInfo | null, email: string | null): Account {
    return {
      id: user.id,
      username: user.username,
      email: email ?? contact?.correoPrincipal ?? null,
      role: user.role,
      nombreCompleto: contact?.nombreCompleto ?? null,
      nombreEmpresa: contact?.nombreEmpresa ?? null,
    };
  }
}

function readString(source: Record<string, unknown>, key: string): string | null {
  const value = source[key];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}
