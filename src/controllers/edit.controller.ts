// ============================================
// MELIAPP - Edit Profile Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { ProfileEditService } from '../services/profile-edit.service.js';
import { requireUser } from '../plugins/auth.plugin.js';
import {
  editUserSchema,
  editLocationSchema,
  editContactSchema,
  ownDataTableParamSchema,
} from '../schemas/profile.schema.js';
import { toContactJson, toLocationJson, toUserJson } from './serializers.js';

export const editController: FastifyPluginAsync = async (fastify) => {
  const editService = new ProfileEditService(fastify.db, fastify.log);

  // Every route here acts on the caller's own rows
  fastify.addHook('preHandler', fastify.authenticate);

  fastify.post('/api/edit/usuarios', async (request) => {
    const body = editUserSchema.parse(request.body);
    const user = await editService.editUser(requireUser(request).userId, body);
    return { success: true, message: 'Usuario actualizado', data: toUserJson(user) };
  });

  fastify.post('/api/edit/ubicaciones', async (request) => {
    const body = editLocationSchema.parse(request.body);
    const location = await editService.editLocation(requireUser(request).userId, body);
    return { success: true, message: 'Ubicación actualizada', data: toLocationJson(location) };
  });

  fastify.post('/api/edit/info_contacto', async (request) => {
    const body = editContactSchema.parse(request.body);
    const contact = await editService.editContact(requireUser(request).userId, body);
    return { success: true, message: 'Información de contacto actualizada', data: toContactJson(contact) };
  });

  fastify.get('/api/data/:table', async (request) => {
    const { table } = ownDataTableParamSchema.parse(request.params);
    const userId = requireUser(request).userId;

    switch (table) {
      case 'usuarios': {
        const rows = await editService.getOwnUsers(userId);
        return { success: true, table, data: rows.map(toUserJson) };
      }
      case 'info_contacto': {
        const rows = await editService.getOwnContacts(userId);
        return { success: true, table, data: rows.map(toContactJson) };
      }
      case 'ubicaciones': {
        const rows = await editService.getOwnLocations(userId);
        return { success: true, table, data: rows.map(toLocationJson) };
      }
    }
  });
};
