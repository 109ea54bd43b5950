// ============================================
// MELIAPP - Public Endpoints API Tests
// ============================================

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { buildTestApp, seedUser, type TestContext } from './helpers/app.js';

describe('Public API', () => {
  let ctx: TestContext;

  beforeAll(async () => {
    ctx = await buildTestApp();
    await seedUser(ctx.database, 'apicultora', { comuna: 'Chillán' });
    await seedUser(ctx.database, 'visitante');
  });

  afterAll(async () => {
    await ctx.app.close();
    await ctx.database.close();
  });

  describe('Service info', () => {
    it('should report health', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/health' });
      expect(res.json().status).toBe('ok');
    });

    it('should describe the API', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api' });
      expect(res.json()).toEqual({ name: 'Meliapp API', version: '1.0.0', framework: 'Fastify' });
    });

    it('should answer unknown routes with the error envelope', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/colmenas' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        success: false,
        code: 'NOT_FOUND',
        message: 'Ruta GET /api/colmenas no encontrada',
      });
    });
  });

  describe('Botanical classes', () => {
    it('should list the communes', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/botanical-classes' });

      expect(res.json().total).toBe(7);
      expect(res.json().communes[0]).toBe('Chillán');
    });

    it('should return the classes of a commune', async () => {
      const res = await ctx.app.inject({
        method: 'GET',
        url: `/api/botanical-classes/${encodeURIComponent('Chillán')}`,
      });
      const body = res.json();

      expect(body.comuna).toBe('Chillán');
      expect(body.total_classes).toBe(4);
      expect(body.classes[1]).toMatchObject({ clase: 'Arbusto', especies: ['Maqui'], cantidad: 1 });
    });

    it('should report unknown communes with the available ones', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/botanical-classes/Atlantis' });
      const body = res.json();

      expect(res.statusCode).toBe(404);
      expect(body.message).toBe('Comuna no registrada: Atlantis');
      expect(body.details.available_communes).toHaveLength(7);
    });
  });

  describe('Table browser', () => {
    it('should list the browsable tables', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/tables' });

      expect(res.json().tables).toEqual([
        'usuarios',
        'info_contacto',
        'ubicaciones',
        'produccion_apicola',
        'origenes_botanicos',
        'solicitudes_apicultor',
        'lotes',
      ]);
    });

    it('should paginate rows', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/table/usuarios?page=2&per_page=1' });
      const body = res.json();

      expect(body.table).toBe('usuarios');
      expect(body.data).toHaveLength(1);
      expect(body.pagination).toEqual({ page: 2, per_page: 1, total: 2, total_pages: 2 });
    });

    it('should return an empty page past the end', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/table/lotes' });

      expect(res.json().data).toEqual([]);
      expect(res.json().pagination).toEqual({ page: 1, per_page: 20, total: 0, total_pages: 0 });
    });

    it('should reject tables outside the catalogue', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/table/pg_shadow' });

      expect(res.statusCode).toBe(404);
      expect(res.json().message).toBe('Tabla no encontrada: pg_shadow');
    });

    it('should cap the page size', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/table/usuarios?per_page=500' });
      expect(res.statusCode).toBe(400);
    });
  });

  describe('Pages', () => {
    it.each([
      ['/', 'id="search-form"'],
      ['/login', 'id="login-form"'],
      ['/register', 'id="register-form"'],
    ])('should serve %s', async (url, marker) => {
      const res = await ctx.app.inject({ method: 'GET', url });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toContain('text/html');
      expect(res.body).toContain(marker);
    });

    it('should serve the stylesheet', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/static/styles.css' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toContain('text/css');
    });
  });
});
