// ============================================
// MELIAPP - Hosted Identity Provider Tests
// ============================================

import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { buildApp } from '../src/app.js';
import { SupabaseIdentityProvider, type FetchFn } from '../src/services/identity.provider.js';
import { ServiceUnavailableError, ValidationError } from '../src/plugins/error-handler.plugin.js';
import { createTestDatabase, type TestDatabase } from './helpers/database.js';

const AUTH_URL = 'http://localhost:54321';

interface RecordedRequest {
  url: string;
  method: string | undefined;
  headers: Headers;
  body: string | null;
}

describe('SupabaseIdentityProvider', () => {
  let requests: RecordedRequest[];

  beforeEach(() => {
    requests = [];
  });

  function stubFetch(status: number, body: unknown): FetchFn {
    return async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      const sent = init?.body;
      requests.push({
        url: String(input),
        method: init?.method,
        headers: new Headers(init?.headers),
        body: typeof sent === 'string' ? sent : null,
      });
      return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
      });
    };
  }

  // No service role key: the provider has no admin rights
  function provider(fetchFn: FetchFn): SupabaseIdentityProvider {
    return new SupabaseIdentityProvider({
      url: AUTH_URL,
      anonKey: 'test-anon-key',
      serviceRoleKey: undefined,
      fetch: fetchFn,
    });
  }

  describe('Construction', () => {
    let database: TestDatabase;

    beforeAll(async () => {
      database = await createTestDatabase();
    });

    afterAll(async () => {
      await database.close();
    });

    it('should build without a global WebSocket', () => {
      expect(() => new SupabaseIdentityProvider({ url: AUTH_URL, anonKey: 'test-anon-key' })).not.toThrow();
    });

    it('should be the default provider of the app', async () => {
      const app = await buildApp({ logger: false, db: database.db });
      await app.ready();

      expect(app.identity).toBeInstanceOf(SupabaseIdentityProvider);
      await app.close();
    });
  });

  describe('updatePassword', () => {
    it('should update the password with the user token alone', async () => {
      await provider(stubFetch(200, { id: 'u1' })).updatePassword('recovery-token', 'nueva123');

      expect(requests).toHaveLength(1);
      expect(requests[0].url).toBe(`${AUTH_URL}/auth/v1/user`);
      expect(requests[0].method).toBe('PUT');
      expect(requests[0].headers.get('authorization')).toBe('Bearer recovery-token');
      expect(requests[0].headers.get('apikey')).toBe('test-anon-key');
      expect(requests[0].body).toBe('{"password":"nueva123"}');
    });

    it('should reject an expired token', async () => {
      const error = await provider(stubFetch(401, { code: 401, msg: 'invalid JWT' }))
        .updatePassword('recovery-token', 'nueva123')
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        statusCode: 400,
        message: 'Token inválido o expirado. Solicita un nuevo enlace de recuperación.',
      });
    });

    it('should report weak passwords with their reasons', async () => {
      const error = await provider(stubFetch(422, {
        code: 422,
        error_code: 'weak_password',
        msg: 'Password should be at least 8 characters',
        weak_password: { reasons: ['length'] },
      }))
        .updatePassword('recovery-token', 'corta1')
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message: 'La contraseña es demasiado débil', details: ['length'] });
    });

    it('should report an unreachable service', async () => {
      const failing: FetchFn = async () => {
        throw new TypeError('fetch failed');
      };

      await expect(provider(failing).updatePassword('recovery-token', 'nueva123'))
        .rejects.toBeInstanceOf(ServiceUnavailableError);
    });

    it('should serve the reset endpoint without admin rights', async () => {
      const database = await createTestDatabase();
      const app = await buildApp({ logger: false, db: database.db, identity: provider(stubFetch(200, { id: 'u1' })) });

      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/reset-password',
        payload: { token: 'recovery-token', password: 'nueva123' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ success: true, message: 'Contraseña actualizada correctamente' });
      await app.close();
      await database.close();
    });
  });

  describe('Without admin rights', () => {
    it('should not delete users', async () => {
      expect(await provider(stubFetch(200, {})).deleteUser('u1')).toBe(false);
      expect(requests).toEqual([]);
    });
  });

  describe('getOAuthUrl', () => {
    it('should point at the provider authorize endpoint', async () => {
      const url = new URL(await provider(stubFetch(200, {}))
        .getOAuthUrl('google', 'http://localhost:3000/auth/callback'));

      expect(url.origin + url.pathname).toBe(`${AUTH_URL}/auth/v1/authorize`);
      expect(url.searchParams.get('provider')).toBe('google');
      expect(url.searchParams.get('redirect_to')).toBe('http://localhost:3000/auth/callback');
      expect(requests).toEqual([]);
    });
  });
});
