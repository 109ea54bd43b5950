// ============================================
// MELIAPP - HTML Page Shells
// ============================================

import { FastifyPluginAsync } from 'fastify';

// route -> file under client/
const PAGES: Record<string, string> = {
  '/': 'index.html',
  '/login': 'login.html',
  '/register': 'login.html',
  '/reset-password': 'reset-password.html',
  '/auth/callback': 'auth-callback.html',
};

export const pagesController: FastifyPluginAsync = async (fastify) => {
  for (const [route, file] of Object.entries(PAGES)) {
    fastify.get(route, async (_request, reply) => {
      return reply.sendFile(file);
    });
  }
};
