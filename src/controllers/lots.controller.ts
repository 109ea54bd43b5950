// ============================================
// MELIAPP - Honey Lots Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { LotService } from '../services/lot.service.js';
import { QrService } from '../services/qr.service.js';
import { requireUser } from '../plugins/auth.plugin.js';
import { lotIdParamSchema, userIdParamSchema, qrQuerySchema } from '../schemas/common.schema.js';
import {
  lotFieldsSchema,
  manageLotSchema,
  reorderLotsSchema,
  compositionUpdateSchema,
} from '../schemas/lots.schema.js';
import { formatComposition } from '../shared/composition.js';
import { toLotDetail, toLotSummary } from './serializers.js';

export const lotsController: FastifyPluginAsync = async (fastify) => {
  const lotService = new LotService(fastify.db, fastify.botanical, fastify.log);
  const qrService = new QrService();

  // Public list, ordered by orden_miel
  fastify.get('/api/lotes/:userId', async (request) => {
    const { userId } = userIdParamSchema.parse(request.params);
    const lots = await lotService.listLots(userId);
    return { success: true, lotes: lots.map(toLotSummary), total: lots.length };
  });

  fastify.post('/api/lotes', {
    preHandler: fastify.authenticate,
  }, async (request, reply) => {
    const body = lotFieldsSchema.parse(request.body);
    const lot = await lotService.createLot(requireUser(request).userId, body);
    reply.status(201);
    return { success: true, message: 'Lote creado', lote: toLotDetail(lot) };
  });

  // Form endpoint: lote_id present means update
  fastify.post('/api/gestionar-lote', {
    preHandler: fastify.authenticate,
  }, async (request, reply) => {
    const body = manageLotSchema.parse(request.body);
    const { lot, created } = await lotService.manageLot(requireUser(request).userId, body);
    if (created) {
      reply.status(201);
    }
    return {
      success: true,
      message: created ? 'Lote creado' : 'Lote actualizado',
      lote: toLotDetail(lot),
    };
  });

  fastify.put('/api/lote/:loteId', {
    preHandler: fastify.authenticate,
  }, async (request) => {
    const { loteId } = lotIdParamSchema.parse(request.params);
    const body = lotFieldsSchema.parse(request.body);
    const lot = await lotService.updateLot(requireUser(request).userId, loteId, body);
    return { success: true, message: 'Lote actualizado', lote: toLotDetail(lot) };
  });

  fastify.delete('/api/lote/:loteId', {
    preHandler: fastify.authenticate,
  }, async (request) => {
    const { loteId } = lotIdParamSchema.parse(request.params);
    const order = await lotService.deleteLot(requireUser(request).userId, loteId);
    return { success: true, message: 'Lote eliminado', orden_eliminado: order };
  });

  fastify.post('/api/lotes/reorder', {
    preHandler: fastify.authenticate,
  }, async (request) => {
    const { orden } = reorderLotsSchema.parse(request.body);
    const lots = await lotService.reorderLots(requireUser(request).userId, orden);
    return { success: true, lotes: lots.map(toLotSummary), total: lots.length };
  });

  // Pollen composition
  fastify.get('/api/lote/composicion/:loteId', async (request) => {
    const { loteId } = lotIdParamSchema.parse(request.params);
    const { composition, total } = await lotService.getComposition(loteId);
    return { success: true, composicion: formatComposition(composition), total };
  });

  fastify.put('/api/lote/composicion/:loteId', {
    preHandler: fastify.authenticate,
  }, async (request) => {
    const { loteId } = lotIdParamSchema.parse(request.params);
    const { composicion } = compositionUpdateSchema.parse(request.body);
    const { composition, total } = await lotService.updateComposition(
      requireUser(request).userId,
      loteId,
      composicion
    );
    return { success: true, composicion: formatComposition(composition), total };
  });

  fastify.post('/api/lote/click/:loteId', {
    preHandler: fastify.optionalAuth,
  }, async (request) => {
    const { loteId } = lotIdParamSchema.parse(request.params);
    const lot = await lotService.recordClick(loteId, request.user?.userId);
    return { success: true, lote_nombre: lot.nombreMiel, lote_orden: lot.ordenMiel };
  });

  fastify.get('/api/lote/:loteId/qr', async (request, reply) => {
    const { loteId } = lotIdParamSchema.parse(request.params);
    const { format, scale } = qrQuerySchema.parse(request.query);
    const lot = await lotService.getLot(loteId);
    const target = qrService.lotUrl(lot.id);

    reply.header('Cache-Control', 'no-store');
    if (format === 'json') {
      return {
        success: true,
        qr_code: await qrService.toDataUrl(target, { scale }),
        lote_id: lot.id,
        url: target,
      };
    }
    const png = await qrService.toPng(target, { scale });
    return reply.type('image/png').send(png);
  });

  // Target of the lot QR code
  fastify.get('/lote/:loteId', async (request, reply) => {
    const { loteId } = lotIdParamSchema.parse(request.params);
    const lot = await lotService.getLot(loteId);
    return reply.redirect(302, `/profile/${lot.userId}?lote=${lot.id}`);
  });

  fastify.get('/api/usuario-info/:userId', async (request) => {
    const { userId } = userIdParamSchema.parse(request.params);
    const { comuna, especies } = await lotService.speciesForUser(userId);
    return { success: true, comuna, especies, total_especies: especies.length };
  });
};
