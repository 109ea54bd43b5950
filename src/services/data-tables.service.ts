// ============================================
// MELIAPP - Data Tables Service
// ============================================

import {
  DataTableRepository,
  BROWSABLE_TABLES,
  type BrowsableTable,
  type TableRow,
} from '../repositories/data-table.repository.js';
import { NotFoundError } from '../plugins/error-handler.plugin.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface TablePage {
  table: BrowsableTable;
  rows: TableRow[];
  page: number;
  perPage: number;
  total: number;
  totalPages: number;
}

function isBrowsable(name: string): name is BrowsableTable {
  return BROWSABLE_TABLES.some(t => t === name);
}

export class DataTablesService {
  private tableRepo: DataTableRepository;

  constructor(db: DrizzleDb) {
    this.tableRepo = new DataTableRepository(db);
  }

  listTables(): readonly BrowsableTable[] {
    return BROWSABLE_TABLES;
  }

  async getPage(name: string, page: number, perPage: number): Promise<TablePage> {
    if (!isBrowsable(name)) {
      throw new NotFoundError(`Tabla no encontrada: ${name}`, { available_tables: BROWSABLE_TABLES });
    }

    const [total, rows] = await Promise.all([
      this.tableRepo.countRows(name),
      this.tableRepo.listRows(name, perPage, (page - 1) * perPage),
    ]);

    return {
      table: name,
      rows,
      page,
      perPage,
      total,
      totalPages: Math.ceil(total / perPage),
    };
  }
}
