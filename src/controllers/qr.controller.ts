// ============================================
// MELIAPP - User QR Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { QrService } from '../services/qr.service.js';
import { requireUser } from '../plugins/auth.plugin.js';
import { ForbiddenError } from '../plugins/error-handler.plugin.js';
import { qrQuerySchema, segmentParamSchema } from '../schemas/common.schema.js';

export const qrController: FastifyPluginAsync = async (fastify) => {
  const qrService = new QrService();

  // Only the owner may render the QR for their own profile
  fastify.get('/api/usuario/:segment/qr', {
    preHandler: fastify.authenticate,
  }, async (request, reply) => {
    const { segment } = segmentParamSchema.parse(request.params);
    const { format, scale } = qrQuerySchema.parse(request.query);
    const user = requireUser(request);

    if (!user.userId.startsWith(segment.toLowerCase())) {
      throw new ForbiddenError('Solo puedes generar el código QR de tu propio perfil');
    }

    const target = qrService.profileUrl(user.userId);
    if (format === 'json') {
      return {
        success: true,
        qr_code: await qrService.toDataUrl(target, { scale }),
        user_id: user.userId,
        uuid_segment: segment.toLowerCase(),
      };
    }

    const png = await qrService.toPng(target, { scale });
    return reply
      .header('Cache-Control', 'no-store')
      .type('image/png')
      .send(png);
  });
};
