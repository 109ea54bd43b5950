// ============================================
// MELIAPP - Search, Profile & Edit API Tests
// ============================================

import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { buildTestApp, seedUser, type SeededUser, type TestContext } from './helpers/app.js';

describe('Profile API', () => {
  let ctx: TestContext;
  let owner: SeededUser;
  let visitor: SeededUser;

  beforeAll(async () => {
    ctx = await buildTestApp();
  });

  afterAll(async () => {
    await ctx.app.close();
    await ctx.database.close();
  });

  beforeEach(async () => {
    await ctx.database.reset();
    owner = await seedUser(ctx.database, 'apicultora', { nombreCompleto: 'Ana Miel', comuna: 'Chillán' });
    visitor = await seedUser(ctx.database, 'visitante');
  });

  describe('Suggestions and search', () => {
    it('should not suggest for a single character', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/sugerir?q=a' });
      expect(res.json()).toEqual({ success: true, suggestions: [] });
    });

    it('should suggest matching usernames', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/sugerir?q=APIC' });

      expect(res.json().suggestions).toEqual([
        { id: owner.id, nombre: 'apicultora', especialidad: 'APICULTOR' },
      ]);
    });

    it('should fall back to contact names', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/sugerir?q=Ana' });

      expect(res.json().suggestions).toEqual([
        { id: owner.id, nombre: 'Ana Miel', especialidad: 'APICULTOR' },
      ]);
    });

    it('should tag results with their table', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/search?q=apicultora' });
      const body = res.json();
      const users = body.results.filter((r: { _table: string }) => r._table === 'usuarios');

      expect(body.query).toBe('apicultora');
      expect(users).toEqual([
        { _table: 'usuarios', id: owner.id, auth_user_id: owner.id, title: 'apicultora', subtitle: 'APICULTOR' },
      ]);
    });

    it('should find lots by honey name', async () => {
      await ctx.app.inject({
        method: 'POST',
        url: '/api/lotes',
        headers: owner.authHeader,
        payload: { nombre_miel: 'Miel de Quillay', temporada: 4, anio: 2024 },
      });

      const res = await ctx.app.inject({ method: 'GET', url: '/api/search?q=quillay' });

      expect(res.json().results).toEqual([
        expect.objectContaining({
          _table: 'lotes',
          auth_user_id: owner.id,
          title: 'Miel de Quillay',
          subtitle: '2024 · temporada 4',
        }),
      ]);
    });

    it('should treat LIKE wildcards literally', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/search?q=%25' });
      expect(res.json()).toEqual({ success: true, query: '%', results: [], total: 0 });
    });
  });

  describe('Profiles', () => {
    it('should return the public profile by username', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/profile/apicultora' });

      expect(res.json().profile).toMatchObject({
        auth_user_id: owner.id,
        username: 'apicultora',
        nombre_completo: 'Ana Miel',
        comuna: 'Chillán',
      });
    });

    it('should return the caller profile', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/profile/me', headers: visitor.authHeader });
      expect(res.json().profile.username).toBe('visitante');
    });

    it('should return the full profile with the QR link', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: `/api/profile/${owner.id}/full` });

      expect(res.json()).toMatchObject({
        success: true,
        user: { auth_user_id: owner.id },
        contact_info: { nombre_completo: 'Ana Miel' },
        locations: [],
        lots: [],
        produccion_total: 0,
        comuna: 'Chillán',
        qr_url: `/api/usuario/${owner.id.slice(0, 8)}/qr`,
      });
    });

    it('should report unknown profiles', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/profile/nadie_registrado' });

      expect(res.statusCode).toBe(404);
      expect(res.json().message).toBe('Usuario no encontrado');
    });

    it('should redirect a short id to the profile page', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: `/api/usuario/${owner.id.slice(0, 8).toUpperCase()}` });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe(`/profile/${owner.id}`);
    });

    it('should reject segments that are not hexadecimal', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/usuario/zzzzzzzz' });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('El segmento debe ser hexadecimal');
    });

    it('should redirect a username to the canonical profile URL', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/profile/apicultora?lote=abc' });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe(`/profile/${owner.id}?lote=abc`);
    });

    it('should serve the profile page for a canonical URL', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: `/profile/${owner.id}` });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toContain('text/html');
      expect(res.body).toContain('id="lotes-carousel"');
    });
  });

  describe('Profile QR', () => {
    it('should render the owner QR as JSON', async () => {
      const segment = owner.id.slice(0, 8);
      const res = await ctx.app.inject({
        method: 'GET',
        url: `/api/usuario/${segment}/qr?format=json`,
        headers: owner.authHeader,
      });
      const body = res.json();

      expect(body.user_id).toBe(owner.id);
      expect(body.uuid_segment).toBe(segment);
      expect(body.qr_code.startsWith('data:image/png;base64,')).toBe(true);
    });

    it('should refuse the QR of someone else', async () => {
      const res = await ctx.app.inject({
        method: 'GET',
        url: `/api/usuario/${owner.id.slice(0, 8)}/qr`,
        headers: visitor.authHeader,
      });

      expect(res.statusCode).toBe(403);
      expect(res.json().message).toBe('Solo puedes generar el código QR de tu propio perfil');
    });

    it('should reject unsupported formats', async () => {
      const res = await ctx.app.inject({
        method: 'GET',
        url: `/api/usuario/${owner.id.slice(0, 8)}/qr?format=svg`,
        headers: owner.authHeader,
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('Formato no soportado, usa png o json');
    });
  });

  describe('Editing', () => {
    it('should require a session', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/edit/usuarios',
        payload: { role: 'PROVEEDOR' },
      });

      expect(res.statusCode).toBe(401);
    });

    it('should update the role', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/edit/usuarios',
        headers: owner.authHeader,
        payload: { role: 'PROVEEDOR' },
      });

      expect(res.json()).toMatchObject({
        success: true,
        message: 'Usuario actualizado',
        data: { username: 'apicultora', role: 'PROVEEDOR', tipo_usuario: 'Regular' },
      });
    });

    it('should reject a username held by someone else', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/edit/usuarios',
        headers: owner.authHeader,
        payload: { username: 'visitante' },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json().message).toBe('El nombre de usuario ya está en uso');
    });

    it('should reject an empty edit', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/edit/usuarios',
        headers: owner.authHeader,
        payload: {},
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('No se enviaron campos para actualizar');
    });

    it('should replace the apiary location', async () => {
      const first = await ctx.app.inject({
        method: 'POST',
        url: '/api/edit/ubicaciones',
        headers: owner.authHeader,
        payload: { ubicacion: '4RFV+QX Chillán', comuna: 'Chillán' },
      });
      await ctx.app.inject({
        method: 'POST',
        url: '/api/edit/ubicaciones',
        headers: owner.authHeader,
        payload: { ubicacion: '8QJ2+5C Pucón', comuna: 'Pucón', nombre: 'Apiario del lago' },
      });
      const own = await ctx.app.inject({ method: 'GET', url: '/api/data/ubicaciones', headers: owner.authHeader });

      expect(first.json().data).toMatchObject({
        nombre: 'Apiario principal',
        norma_geo: '4RFV+QX Chillán',
        comuna: 'Chillán',
      });
      expect(own.json().data).toEqual([
        expect.objectContaining({ nombre: 'Apiario del lago', norma_geo: '8QJ2+5C Pucón' }),
      ]);
    });

    it('should reject locations that are not Plus Codes', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/edit/ubicaciones',
        headers: owner.authHeader,
        payload: { ubicacion: 'Camino a Chillán km 4' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('Ubicación inválida: usa un Plus Code de Google (ej. "4RFV+QX Chillán")');
    });

    it('should update contact fields', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/edit/info_contacto',
        headers: visitor.authHeader,
        payload: { telefono_principal: '+56 9 1234 5678', comuna: ' Talca ' },
      });
      const own = await ctx.app.inject({ method: 'GET', url: '/api/data/info_contacto', headers: visitor.authHeader });

      expect(res.json().data).toMatchObject({ telefono_principal: '+56 9 1234 5678', comuna: 'Talca' });
      expect(own.json().data).toEqual([expect.objectContaining({ comuna: 'Talca' })]);
    });

    it('should refuse tables outside the editable set', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/data/lotes', headers: owner.authHeader });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('Tabla no permitida');
    });
  });
});
