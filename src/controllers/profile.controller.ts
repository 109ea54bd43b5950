// ============================================
// MELIAPP - Search & Profile Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { SearchService, SUGGESTION_MIN_LENGTH } from '../services/search.service.js';
import { requireUser } from '../plugins/auth.plugin.js';
import { NotFoundError } from '../plugins/error-handler.plugin.js';
import {
  UUID_SEGMENT_LENGTH,
  searchQuerySchema,
  suggestQuerySchema,
  segmentParamSchema,
  identifierParamSchema,
} from '../schemas/common.schema.js';
import { toFullProfileJson, toPublicProfileJson } from './serializers.js';

export const profileController: FastifyPluginAsync = async (fastify) => {
  const searchService = new SearchService(fastify.db);

  // Autocomplete for the search box
  fastify.get('/sugerir', async (request) => {
    const { q } = suggestQuerySchema.parse(request.query);
    if (q.length < SUGGESTION_MIN_LENGTH) {
      return { success: true, suggestions: [] };
    }
    return { success: true, suggestions: await searchService.suggest(q) };
  });

  fastify.get('/api/search', async (request) => {
    const { q, limit } = searchQuerySchema.parse(request.query);
    const hits = await searchService.search(q, limit);
    return {
      success: true,
      query: q,
      results: hits.map(hit => ({
        _table: hit.table,
        id: hit.id,
        auth_user_id: hit.userId,
        title: hit.title,
        subtitle: hit.subtitle,
      })),
      total: hits.length,
    };
  });

  // Registered before /:userId so "me" is not read as an identifier
  fastify.get('/api/profile/me', {
    preHandler: fastify.authenticate,
  }, async (request) => {
    const user = requireUser(request);
    const profile = await searchService.getPublicProfile(user.userId);
    return { success: true, profile: toPublicProfileJson(profile.user, profile.contact) };
  });

  fastify.get<{ Params: { userId: string } }>('/api/profile/:userId', async (request) => {
    const profile = await searchService.getPublicProfile(request.params.userId);
    return { success: true, profile: toPublicProfileJson(profile.user, profile.contact) };
  });

  fastify.get<{ Params: { userId: string } }>('/api/profile/:userId/full', async (request) => {
    const profile = await searchService.getFullProfile(request.params.userId);
    const segment = profile.user.id.slice(0, UUID_SEGMENT_LENGTH);
    return {
      success: true,
      ...toFullProfileJson(profile, `/api/usuario/${segment}/qr`),
    };
  });

  // Short link: /api/usuario/1a2b3c4d -> /profile/<uuid>
  fastify.get('/api/usuario/:segment', async (request, reply) => {
    const { segment } = segmentParamSchema.parse(request.params);
    const user = await searchService.resolveSegment(segment);
    if (!user) {
      throw new NotFoundError('Usuario no encontrado');
    }
    return reply.redirect(302, `/profile/${user.id}`);
  });

  fastify.get('/profile/:identifier', async (request, reply) => {
    const { identifier } = identifierParamSchema.parse(request.params);
    const user = await searchService.resolveUser(identifier);
    if (!user) {
      throw new NotFoundError('Usuario no encontrado');
    }

    if (identifier !== user.id) {
      const queryIndex = request.url.indexOf('?');
      const query = queryIndex >= 0 ? request.url.slice(queryIndex) : '';
      return reply.redirect(302, `/profile/${user.id}${query}`);
    }
    return reply.sendFile('profile.html');
  });
};
