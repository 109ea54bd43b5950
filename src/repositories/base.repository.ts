// ============================================
// MELIAPP - Base Repository
// ============================================

import type { DrizzleDb } from '../db/drizzle.js';

export abstract class BaseRepository {
  constructor(protected db: DrizzleDb) {}

  // Every statement issued through `tx` runs on the same connection
  protected async inTransaction<T>(work: (tx: DrizzleDb) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => work(tx));
  }

  protected first<T>(rows: T[]): T | null {
    return rows.length > 0 ? rows[0] : null;
  }

  // Escapes LIKE wildcards in user input and wraps it for substring matching
  protected containsPattern(term: string): string {
    return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
  }

  protected generateId(): string {
    return crypto.randomUUID();
  }

  protected now(): Date {
    return new Date();
  }
}
