// ============================================
// MELIAPP - CORS Plugin
// ============================================

import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import cors from '@fastify/cors';
import { env, isDevelopment } from '../config/env.js';

const corsPluginImpl: FastifyPluginAsync = async (fastify) => {
  // Same-origin pages need nothing; other origins only when listed
  const allowed = env.CORS_ORIGINS.length > 0 ? env.CORS_ORIGINS : [env.PUBLIC_BASE_URL];

  await fastify.register(cors, {
    origin: isDevelopment() ? true : allowed,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  });
};

export const corsPlugin = fp(corsPluginImpl, {
  name: 'meliapp-cors',
});
