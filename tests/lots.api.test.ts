// ============================================
// MELIAPP - Honey Lots API Tests
// ============================================

import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { buildTestApp, seedUser, type SeededUser, type TestContext } from './helpers/app.js';

const UNKNOWN_LOT = '00000000-0000-4000-8000-000000000000';

describe('Lots API', () => {
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
    owner = await seedUser(ctx.database, 'apicultora', { comuna: 'Chillán' });
    visitor = await seedUser(ctx.database, 'visitante');
  });

  async function createLot(nombre: string, extra: Record<string, unknown> = {}): Promise<string> {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/api/lotes',
      headers: owner.authHeader,
      payload: { nombre_miel: nombre, temporada: 1, anio: 2024, kg_producidos: 80, ...extra },
    });
    expect(res.statusCode).toBe(201);
    return res.json().lote.id;
  }

  async function listNames(): Promise<Array<[string, number]>> {
    const res = await ctx.app.inject({ method: 'GET', url: `/api/lotes/${owner.id}` });
    return res.json().lotes.map((l: { nombre_miel: string; orden_miel: number }) => [l.nombre_miel, l.orden_miel]);
  }

  describe('CRUD', () => {
    it('should create a lot for the caller', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/lotes',
        headers: owner.authHeader,
        payload: { nombre_miel: ' Ulmo Otoño ', temporada: '3', anio: '2023', kg_producidos: '45.5' },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({
        success: true,
        message: 'Lote creado',
        lote: {
          nombre_miel: 'Ulmo Otoño',
          orden_miel: 1,
          temporada: 3,
          anio: 2023,
          kg_producidos: 45.5,
          auth_user_id: owner.id,
        },
      });
    });

    it('should require a session to create lots', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/lotes',
        payload: { nombre_miel: 'Anónimo', temporada: 1, anio: 2024 },
      });

      expect(res.statusCode).toBe(401);
    });

    it('should reject a season outside 1-4', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/lotes',
        headers: owner.authHeader,
        payload: { nombre_miel: 'Invierno', temporada: 5, anio: 2024 },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('La temporada debe ser 1, 2, 3 o 4');
    });

    it('should list lots publicly in order', async () => {
      await createLot('Lote A');
      await createLot('Lote B');

      const res = await ctx.app.inject({ method: 'GET', url: `/api/lotes/${owner.id}` });

      expect(res.json().total).toBe(2);
      expect(await listNames()).toEqual([['Lote A', 1], ['Lote B', 2]]);
    });

    it('should create and update through the form endpoint', async () => {
      const created = await ctx.app.inject({
        method: 'POST',
        url: '/api/gestionar-lote',
        headers: owner.authHeader,
        payload: { nombre_miel: 'Quillay', temporada: 2, anio: 2024 },
      });
      const loteId = created.json().lote.id;

      const updated = await ctx.app.inject({
        method: 'POST',
        url: '/api/gestionar-lote',
        headers: owner.authHeader,
        payload: { lote_id: loteId, nombre_miel: 'Quillay Reserva', temporada: 2, anio: 2024 },
      });

      expect(created.statusCode).toBe(201);
      expect(updated.statusCode).toBe(200);
      expect(updated.json()).toMatchObject({
        message: 'Lote actualizado',
        lote: { id: loteId, nombre_miel: 'Quillay Reserva', orden_miel: 1 },
      });
    });

    it('should not let another user update a lot', async () => {
      const loteId = await createLot('Lote A');

      const res = await ctx.app.inject({
        method: 'PUT',
        url: `/api/lote/${loteId}`,
        headers: visitor.authHeader,
        payload: { nombre_miel: 'Robado', temporada: 1, anio: 2024 },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json().message).toBe('No tienes permiso para modificar este lote');
    });

    it('should delete a lot and close the gap in the ordering', async () => {
      await createLot('Lote A');
      const middle = await createLot('Lote B');
      await createLot('Lote C');

      const res = await ctx.app.inject({
        method: 'DELETE',
        url: `/api/lote/${middle}`,
        headers: owner.authHeader,
      });

      expect(res.json()).toEqual({ success: true, message: 'Lote eliminado', orden_eliminado: 2 });
      expect(await listNames()).toEqual([['Lote A', 1], ['Lote C', 2]]);
    });

    it('should report unknown lots', async () => {
      const res = await ctx.app.inject({
        method: 'DELETE',
        url: `/api/lote/${UNKNOWN_LOT}`,
        headers: owner.authHeader,
      });

      expect(res.statusCode).toBe(404);
      expect(res.json().message).toBe('Lote no encontrado');
    });

    it('should reject malformed lot ids', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/lote/composicion/42' });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('Identificador inválido');
    });
  });

  describe('Reorder', () => {
    it('should apply the submitted order', async () => {
      const a = await createLot('Lote A');
      const b = await createLot('Lote B');

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/lotes/reorder',
        headers: owner.authHeader,
        payload: { orden: [b, a] },
      });

      expect(res.json().lotes.map((l: { id: string }) => l.id)).toEqual([b, a]);
      expect(await listNames()).toEqual([['Lote B', 1], ['Lote A', 2]]);
    });

    it('should reject an incomplete order with details', async () => {
      const a = await createLot('Lote A');
      await createLot('Lote B');

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/lotes/reorder',
        headers: owner.authHeader,
        payload: { orden: [a] },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        success: false,
        code: 'VALIDATION_ERROR',
        message: 'El orden debe incluir exactamente todos tus lotes',
        details: { expected: 2, received: 1 },
      });
    });
  });

  describe('Composition', () => {
    it('should accept the wire format at creation', async () => {
      const loteId = await createLot('Lote A', { composicion_polen: 'Peumo:25,Quillay:75' });

      const res = await ctx.app.inject({ method: 'GET', url: `/api/lote/composicion/${loteId}` });

      expect(res.json()).toEqual({ success: true, composicion: 'Quillay:75,Peumo:25', total: 100 });
    });

    it('should return an empty composition for a lot without one', async () => {
      const loteId = await createLot('Lote A');

      const res = await ctx.app.inject({ method: 'GET', url: `/api/lote/composicion/${loteId}` });

      expect(res.json()).toEqual({ success: true, composicion: '', total: 0 });
    });

    it('should replace the composition from a map', async () => {
      const loteId = await createLot('Lote A', { composicion_polen: 'Quillay:100' });

      const res = await ctx.app.inject({
        method: 'PUT',
        url: `/api/lote/composicion/${loteId}`,
        headers: owner.authHeader,
        payload: { composicion: { Maqui: 40, Peumo: '35.5' } },
      });

      expect(res.json()).toEqual({ success: true, composicion: 'Maqui:40,Peumo:35.5', total: 75.5 });
    });

    it('should reject a composition above 100%', async () => {
      const loteId = await createLot('Lote A');

      const res = await ctx.app.inject({
        method: 'PUT',
        url: `/api/lote/composicion/${loteId}`,
        headers: owner.authHeader,
        payload: { composicion: 'Maqui:70,Peumo:40' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        message: 'La composición total (110%) no puede superar 100%',
        details: { rule: 'max100', total: 110 },
      });
    });

    it.each([
      ['Ulmo:abc,Maqui:,Peumo:40', 'Par de composición inválido: "Ulmo:abc"'],
      ['garbage', 'Par de composición inválido: "garbage"'],
      [{ Ulmo: '', Maqui: null, Peumo: true }, 'El porcentaje de Ulmo debe ser numérico'],
      [{ Maqui: 40, Peumo: null }, 'El porcentaje de Peumo debe ser numérico'],
      [42, 'La composición debe ser texto "especie:porcentaje" o un mapa de especies'],
    ])('should reject the malformed composition %j', async (composicion, message) => {
      const loteId = await createLot('Lote A', { composicion_polen: 'Quillay:100' });

      const res = await ctx.app.inject({
        method: 'PUT',
        url: `/api/lote/composicion/${loteId}`,
        headers: owner.authHeader,
        payload: { composicion },
      });
      const stored = await ctx.app.inject({ method: 'GET', url: `/api/lote/composicion/${loteId}` });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ success: false, code: 'VALIDATION_ERROR', message });
      expect(stored.json().composicion).toBe('Quillay:100');
    });

    it('should reject a malformed composition at creation', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/lotes',
        headers: owner.authHeader,
        payload: { nombre_miel: 'Lote A', temporada: 1, anio: 2024, composicion_polen: 'Ulmo:40,Quillay' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('Par de composición inválido: "Quillay"');
      expect(await listNames()).toEqual([]);
    });
  });

  describe('Clicks and QR', () => {
    it('should record a click and echo the lot', async () => {
      const loteId = await createLot('Lote Primavera');

      const res = await ctx.app.inject({ method: 'POST', url: `/api/lote/click/${loteId}` });

      expect(res.json()).toEqual({ success: true, lote_nombre: 'Lote Primavera', lote_orden: 1 });
    });

    it('should serve the lot QR as an uncached PNG', async () => {
      const loteId = await createLot('Lote A');

      const res = await ctx.app.inject({ method: 'GET', url: `/api/lote/${loteId}/qr?t=123` });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('image/png');
      expect(res.headers['cache-control']).toBe('no-store');
      expect(res.rawPayload.subarray(1, 4).toString('ascii')).toBe('PNG');
    });

    it('should serve the lot QR as a data URL pointing at the lot link', async () => {
      const loteId = await createLot('Lote A');

      const res = await ctx.app.inject({ method: 'GET', url: `/api/lote/${loteId}/qr?format=json` });
      const body = res.json();

      expect(body.lote_id).toBe(loteId);
      expect(body.url).toBe(`http://localhost:3000/lote/${loteId}`);
      expect(body.qr_code.startsWith('data:image/png;base64,')).toBe(true);
    });

    it('should redirect a scanned lot link to the owner profile', async () => {
      const loteId = await createLot('Lote A');

      const res = await ctx.app.inject({ method: 'GET', url: `/lote/${loteId}` });

      expect(res.statusCode).toBe(302);
      expect(res.headers.location).toBe(`/profile/${owner.id}?lote=${loteId}`);
    });
  });

  describe('Species for the owner commune', () => {
    it('should list species of the contact commune', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: `/api/usuario-info/${owner.id}` });

      expect(res.json()).toEqual({
        success: true,
        comuna: 'Chillán',
        especies: ['Quillay', 'Peumo', 'Maqui', 'Trébol Blanco', 'Diente de León', 'Romero'],
        total_especies: 6,
      });
    });

    it('should report users without a commune', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: `/api/usuario-info/${visitor.id}` });

      expect(res.statusCode).toBe(404);
      expect(res.json().message).toBe('El usuario no tiene una comuna registrada');
    });
  });
});
