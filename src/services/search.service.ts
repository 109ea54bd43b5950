// ============================================
// MELIAPP - Search & Profile Service
// ============================================

import { UserRepository, type User, type ContactInfo } from '../repositories/user.repository.js';
import { LocationRepository, type Location } from '../repositories/location.repository.js';
import {
  ProductionRepository,
  type BeekeeperRequest,
  type BotanicalOrigin,
  type ProductionRecord,
} from '../repositories/production.repository.js';
import { LotRepository, type Lot } from '../repositories/lot.repository.js';
import {
  SearchRepository,
  SEARCHABLE_TABLES,
  type SearchHit,
} from '../repositories/search.repository.js';
import { NotFoundError } from '../plugins/error-handler.plugin.js';
import type { DrizzleDb } from '../db/drizzle.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const SEGMENT_PATTERN = /^[0-9a-f]{4,8}$/i;

export const SUGGESTION_MIN_LENGTH = 2;
const SUGGESTION_LIMIT = 10;

export interface Suggestion {
  id: string;
  nombre: string;
  especialidad: string;
}

export interface PublicProfile {
  user: User;
  contact: ContactInfo | null;
}

export interface FullProfile extends PublicProfile {
  locations: Location[];
  production: ProductionRecord[];
  botanicalOrigins: BotanicalOrigin[];
  lots: Lot[];
  requests: BeekeeperRequest[];
  produccionTotal: number;
  comuna: string | null;
}

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export class SearchService {
  private userRepo: UserRepository;
  private locationRepo: LocationRepository;
  private productionRepo: ProductionRepository;
  private lotRepo: LotRepository;
  private searchRepo: SearchRepository;

  constructor(db: DrizzleDb) {
    this.userRepo = new UserRepository(db);
    this.locationRepo = new LocationRepository(db);
    this.productionRepo = new ProductionRepository(db);
    this.lotRepo = new LotRepository(db);
    this.searchRepo = new SearchRepository(db);
  }

  /**
   * Resolves a user from any public identifier, trying in order: exact
   * username, full UUID, UUID prefix (4 to 8 hex chars), then a
   * case-insensitive username substring.
   */
  async resolveUser(identifier: string): Promise<User | null> {
    const value = identifier.trim();
    if (!value) return null;

    const byUsername = await this.userRepo.getUserByUsername(value);
    if (byUsername) return byUsername;

    if (isUuid(value)) {
      return this.userRepo.getUser(value.toLowerCase());
    }

    if (SEGMENT_PATTERN.test(value)) {
      const byPrefix = await this.userRepo.getUserByIdPrefix(value);
      if (byPrefix) return byPrefix;
    }

    const [partial] = await this.userRepo.searchByUsername(value, 1);
    return partial ?? null;
  }

  // Short public form of the id used in QR links
  async resolveSegment(segment: string): Promise<User | null> {
    return this.userRepo.getUserByIdPrefix(segment.toLowerCase());
  }

  async suggest(query: string): Promise<Suggestion[]> {
    const term = query.trim();
    if (term.length < SUGGESTION_MIN_LENGTH) return [];

    const users = await this.userRepo.searchByUsername(term, SUGGESTION_LIMIT);
    if (users.length > 0) {
      return users.map(u => ({ id: u.id, nombre: u.username, especialidad: u.role }));
    }

    const byName = await this.userRepo.searchByContactName(term, SUGGESTION_LIMIT);
    return byName.map(({ user, contact }) => ({
      id: user.id,
      nombre: contact?.nombreCompleto ?? user.username,
      especialidad: user.role,
    }));
  }

  async search(query: string, limitPerTable: number): Promise<SearchHit[]> {
    const term = query.trim();
    if (!term) return [];

    const perTable = await Promise.all(
      SEARCHABLE_TABLES.map(table => this.searchRepo.search(table, term, limitPerTable))
    );

    const seen = new Set<string>();
    const hits: SearchHit[] = [];
    for (const hit of perTable.flat()) {
      const key = `${hit.table}:${hit.id}`;
      if (seen.has(key)) continue;
      seen.add(key);
      hits.push(hit);
    }
    return hits;
  }

  async getPublicProfile(identifier: string): Promise<PublicProfile> {
    const user = await this.resolveUser(identifier);
    if (!user) {
      throw new NotFoundError('Usuario no encontrado');
    }
    return { user, contact: await this.userRepo.getContact(user.id) };
  }

  async getFullProfile(identifier: string): Promise<FullProfile> {
    const { user, contact } = await this.getPublicProfile(identifier);

    const [locations, production, botanicalOrigins, lots, requests] = await Promise.all([
      this.locationRepo.listForUser(user.id),
      this.productionRepo.listProduction(user.id),
      this.productionRepo.listBotanicalOrigins(user.id),
      this.lotRepo.listByUser(user.id),
      this.productionRepo.listRequests(user.id),
    ]);

    const produccionTotal = production.reduce((sum, p) => sum + p.cantidadKg, 0);
    const comuna = locations.find(l => l.comuna)?.comuna ?? contact?.comuna ?? null;

    return {
      user,
      contact,
      locations,
      production,
      botanicalOrigins,
      lots,
      requests,
      produccionTotal,
      comuna,
    };
  }
}
