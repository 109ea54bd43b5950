// ============================================
// MELIAPP - Data Tables Controller
// ============================================

import { FastifyPluginAsync } from 'fastify';
import { DataTablesService } from '../services/data-tables.service.js';
import { paginationSchema } from '../schemas/common.schema.js';

export const tablesController: FastifyPluginAsync = async (fastify) => {
  const tablesService = new DataTablesService(fastify.db);

  fastify.get('/api/tables', async () => {
    return { success: true, tables: tablesService.listTables() };
  });

  fastify.get<{ Params: { name: string } }>('/api/table/:name', async (request) => {
    const { page, per_page } = paginationSchema.parse(request.query);
    const result = await tablesService.getPage(request.params.name, page, per_page);

    return {
      success: true,
      table: result.table,
      data: result.rows,
      pagination: {
        page: result.page,
        per_page: result.perPage,
        total: result.total,
        total_pages: result.totalPages,
      },
    };
  });
};
