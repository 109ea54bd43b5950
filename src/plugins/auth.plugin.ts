// ============================================
// MELIAPP - Auth Plugin
// ============================================

import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env.js';
import { UnauthorizedError } from './error-handler.plugin.js';

// Claims minted by the identity provider for an authenticated session
const accessTokenClaimsSchema = z.object({
  sub: z.string().uuid(),
  email: z.string().optional(),
  role: z.string().default('authenticated'),
  user_metadata: z.record(z.unknown()).default({}),
  exp: z.number().optional(),
});

export interface AuthenticatedUser {
  userId: string;
  email: string | null;
  metadata: Record<string, unknown>;
  token: string;
  expiresAt?: number;
}

declare module 'fastify' {
  interface FastifyRequest {
    user?: AuthenticatedUser;
  }
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    optionalAuth: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
}

// Tokens revoked by logout before their natural expiry (single process)
const tokenBlacklist = new Map<string, number>();

export function blacklistToken(token: string, expiresAt?: number): void {
  const now = Math.floor(Date.now() / 1000);
  for (const [revoked, exp] of tokenBlacklist) {
    if (exp < now) tokenBlacklist.delete(revoked);
  }
  tokenBlacklist.set(token, expiresAt ?? now + 24 * 3600);
}

export function isTokenBlacklisted(token: string): boolean {
  return tokenBlacklist.has(token);
}

export function verifyToken(token: string): AuthenticatedUser {
  if (isTokenBlacklisted(token)) {
    throw new UnauthorizedError('Sesión cerrada, inicia sesión nuevamente');
  }
  const decoded = jwt.verify(token, env.SUPABASE_JWT_SECRET, { algorithms: ['HS256'] });
  const claims = accessTokenClaimsSchema.parse(decoded);
  return {
    userId: claims.sub,
    email: claims.email ?? null,
    metadata: claims.user_metadata,
    token,
    expiresAt: claims.exp,
  };
}

export function extractBearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.substring(7);
}

/**
 * The authenticated subject. Only valid inside routes guarded by `authenticate`.
 */
export function requireUser(request: FastifyRequest): AuthenticatedUser {
  if (!request.user) {
    throw new UnauthorizedError('Debes iniciar sesión');
  }
  return request.user;
}

const authPluginImpl: FastifyPluginAsync = async (fastify) => {
  // Require authentication
  fastify.decorate('authenticate', async (request: FastifyRequest, _reply: FastifyReply) => {
    const token = extractBearerToken(request);
    if (!token) {
      throw new UnauthorizedError('Debes iniciar sesión');
    }

    try {
      request.user = verifyToken(token);
    } catch (err) {
      if (err instanceof UnauthorizedError) {
        throw err;
      }
      throw new UnauthorizedError('Sesión inválida o expirada');
    }
  });

  // Optional authentication - doesn't fail if no token
  fastify.decorate('optionalAuth', async (request: FastifyRequest, _reply: FastifyReply) => {
    const token = extractBearerToken(request);
    if (!token) {
      return;
    }

    try {
      request.user = verifyToken(token);
    } catch (err) {
      request.log.debug({ err }, 'Ignoring invalid token on optional auth route');
    }
  });
};

// Wrap with fastify-plugin to share decorators across encapsulation boundaries
export const authPlugin = fp(authPluginImpl, {
  name: 'meliapp-auth',
});
