// ============================================
// MELIAPP - Lot Service
// ============================================

import type { FastifyBaseLogger } from 'fastify';
import { LotRepository, type Lot, type LotFields } from '../repositories/lot.repository.js';
import { ClickRepository } from '../repositories/click.repository.js';
import { LocationRepository } from '../repositories/location.repository.js';
import { UserRepository } from '../repositories/user.repository.js';
import { ForbiddenError, NotFoundError, ValidationError } from '../plugins/error-handler.plugin.js';
import { env } from '../config/env.js';
import {
  checkComposition,
  compositionTotal,
  type Composition,
  type SumRule,
} from '../shared/composition.js';
import type { BotanicalService } from './botanical.service.js';
import type { LotFieldsInput, ManageLotInput } from '../schemas/lots.schema.js';
import type { DrizzleDb } from '../db/drizzle.js';

export interface LotComposition {
  composition: Composition;
  total: number;
}

export interface ZoneSpecies {
  comuna: string;
  especies: string[];
}

export class LotService {
  private lotRepo: LotRepository;
  private clickRepo: ClickRepository;
  private locationRepo: LocationRepository;
  private userRepo: UserRepository;

  constructor(
    db: DrizzleDb,
    private botanical: BotanicalService,
    private log: FastifyBaseLogger,
    private sumRule: SumRule = env.COMPOSITION_SUM_RULE
  ) {
    this.lotRepo = new LotRepository(db);
    this.clickRepo = new ClickRepository(db);
    this.locationRepo = new LocationRepository(db);
    this.userRepo = new UserRepository(db);
  }

  async listLots(userId: string): Promise<Lot[]> {
    return this.lotRepo.listByUser(userId);
  }

  async getLot(lotId: string): Promise<Lot> {
    const lot = await this.lotRepo.getLot(lotId);
    if (!lot) {
      throw new NotFoundError('Lote no encontrado');
    }
    return lot;
  }

  async createLot(userId: string, input: LotFieldsInput): Promise<Lot> {
    const composition = this.validatedComposition(input.composicion_polen);
    const lot = await this.lotRepo.createLot(userId, this.toFields(input), composition);
    this.log.info({ userId, lotId: lot.id, orden: lot.ordenMiel }, '[LotService] Lot created');
    return lot;
  }

  async updateLot(userId: string, lotId: string, input: LotFieldsInput): Promise<Lot> {
    await this.requireOwnedLot(userId, lotId);
    const composition = this.validatedComposition(input.composicion_polen);

    const lot = await this.lotRepo.updateLot(lotId, this.toFields(input), composition);
    if (!lot) {
      throw new NotFoundError('Lote no encontrado');
    }
    return lot;
  }

  async manageLot(userId: string, input: ManageLotInput): Promise<{ lot: Lot; created: boolean }> {
    if (input.lote_id) {
      return { lot: await this.updateLot(userId, input.lote_id, input), created: false };
    }
    return { lot: await this.createLot(userId, input), created: true };
  }

  /**
   * Returns the order the deleted lot had. The owner's remaining lots are
   * renumbered 1..n.
   */
  async deleteLot(userId: string, lotId: string): Promise<number> {
    await this.requireOwnedLot(userId, lotId);
    const order = await this.lotRepo.deleteLot(lotId);
    if (order === null) {
      throw new NotFoundError('Lote no encontrado');
    }
    this.log.info({ userId, lotId, orden: order }, '[LotService] Lot deleted');
    return order;
  }

  async reorderLots(userId: string, orderedIds: string[]): Promise<Lot[]> {
    const current = await this.lotRepo.listByUser(userId);
    const owned = new Set(current.map(l => l.id));
    const requested = new Set(orderedIds);

    if (requested.size !== orderedIds.length) {
      throw new ValidationError('El orden contiene lotes repetidos');
    }
    if (orderedIds.length !== current.length || orderedIds.some(id => !owned.has(id))) {
      throw new ValidationError('El orden debe incluir exactamente todos tus lotes', {
        expected: current.length,
        received: orderedIds.length,
      });
    }

    await this.lotRepo.reorder(userId, orderedIds);
    return this.lotRepo.listByUser(userId);
  }

  async getComposition(lotId: string): Promise<LotComposition> {
    await this.getLot(lotId);
    const composition = await this.lotRepo.getComposition(lotId);
    return { composition, total: compositionTotal(composition) };
  }

  async updateComposition(userId: string, lotId: string, composition: Composition): Promise<LotComposition> {
    await this.requireOwnedLot(userId, lotId);
    const valid = this.validatedComposition(composition) ?? {};
    await this.lotRepo.replaceComposition(lotId, valid);
    return { composition: valid, total: compositionTotal(valid) };
  }

  async recordClick(lotId: string, viewerId?: string): Promise<Lot> {
    const lot = await this.getLot(lotId);
    await this.clickRepo.recordClick(lotId, viewerId);
    return lot;
  }

  async countClicks(lotId: string): Promise<number> {
    return this.clickRepo.countForLot(lotId);
  }

  /**
   * Species that can appear in a lot's composition: those recorded for the
   * owner's municipality (first location with one, else the contact row).
   */
  async speciesForUser(userId: string): Promise<ZoneSpecies> {
    const comuna = await this.resolveComuna(userId);
    if (!comuna) {
      throw new NotFoundError('El usuario no tiene una comuna registrada');
    }

    const especies = await this.botanical.getSpecies(comuna);
    if (especies.length === 0) {
      throw new NotFoundError(`No hay especies registradas para la comuna ${comuna}`);
    }
    return { comuna, especies };
  }

  async resolveComuna(userId: string): Promise<string | null> {
    const fromLocation = await this.locationRepo.findComuna(userId);
    if (fromLocation) return fromLocation;
    const contact = await this.userRepo.getContact(userId);
    return contact?.comuna ?? null;
  }

  private async requireOwnedLot(userId: string, lotId: string): Promise<Lot> {
    const lot = await this.getLot(lotId);
    if (lot.userId !== userId) {
      throw new ForbiddenError('No tienes permiso para modificar este lote');
    }
    return lot;
  }

  private validatedComposition(composition: Composition | undefined): Composition | undefined {
    if (composition === undefined) return undefined;

    const problem = checkComposition(composition, this.sumRule);
    if (problem) {
      throw new ValidationError(problem, { rule: this.sumRule, total: compositionTotal(composition) });
    }
    return composition;
  }

  private toFields(input: LotFieldsInput): LotFields {
    return {
      nombreMiel: input.nombre_miel,
      temporada: input.temporada,
      anio: input.anio,
      kgProducidos: input.kg_producidos,
    };
  }
}
