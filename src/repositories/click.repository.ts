// ============================================
// MELIAPP - Lot Click Repository
// ============================================

import { count, eq } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { loteClicks } from '../db/schema/lots.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface LotClick {
  id: string;
  lotId: string;
  viewerId: string | null;
  clickedAt: Date;
}

export class ClickRepository extends BaseRepository {
  constructor(db: DrizzleDb) {
    super(db);
  }

  async recordClick(lotId: string, viewerId?: string): Promise<LotClick> {
    const click: LotClick = {
      id: this.generateId(),
      lotId,
      viewerId: viewerId ?? null,
      clickedAt: this.now(),
    };

    await this.db.insert(loteClicks).values({
      id: click.id,
      loteId: click.lotId,
      viewerId: click.viewerId,
      clickedAt: click.clickedAt,
    });

    return click;
  }

  async countForLot(lotId: string): Promise<number> {
    const [{ value }] = await this.db
      .select({ value: count() })
      .from(loteClicks)
      .where(eq(loteClicks.loteId, lotId));
    return value;
  }
}
