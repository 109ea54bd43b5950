// ============================================
// MELIAPP - Botanical Classes Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import type { BotanicalClassesPayload } from '../types/index.js';

export const botanicalController: FastifyPluginAsync = async (fastify) => {
  const botanical = fastify.botanical;

  fastify.get('/api/botanical-classes', async () => {
    const communes = await botanical.listCommunes();
    return { success: true, communes, total: communes.length };
  });

  fastify.get<{ Params: { comuna: string } }>('/api/botanical-classes/:comuna', async (request) => {
    const comuna = request.params.comuna.trim();
    const classes = await botanical.getClasses(comuna);
    const payload: BotanicalClassesPayload = {
      comuna,
      classes,
      total_classes: classes.length,
    };
    return { success: true, ...payload };
  });
};
