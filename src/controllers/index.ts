// ============================================
// MELIAPP - Controllers Barrel Export & Registration
// ============================================

import { FastifyInstance } from 'fastify';
import { authController } from './auth.controller.js';
import { profileController } from './profile.controller.js';
import { editController } from './edit.controller.js';
import { lotsController } from './lots.controller.js';
import { botanicalController } from './botanical.controller.js';
import { qrController } from './qr.controller.js';
import { tablesController } from './tables.controller.js';
import { pagesController } from './pages.controller.js';

export async function registerControllers(fastify: FastifyInstance): Promise<void> {
  await fastify.register(authController);
  await fastify.register(profileController);
  await fastify.register(editController);
  await fastify.register(lotsController);
  await fastify.register(botanicalController);
  await fastify.register(qrController);
  await fastify.register(tablesController);
  await fastify.register(pagesController);
}

export {
  authController,
  profileController,
  editController,
  lotsController,
  botanicalController,
  qrController,
  tablesController,
  pagesController,
};
