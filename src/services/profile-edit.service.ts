// ============================================
// MELIAPP - Profile Edit Service
// ============================================

import type { FastifyBaseLogger } from 'fastify';
import { UserRepository, type User, type ContactInfo } from '../repositories/user.repository.js';
import { LocationRepository, type Location } from '../repositories/location.repository.js';
import { ConflictError, NotFoundError } from '../plugins/error-handler.plugin.js';
import type { EditContactInput, EditLocationInput, EditUserInput } from '../schemas/profile.schema.js';
import type { DrizzleDb } from '../db/drizzle.js';

export class ProfileEditService {
  private userRepo: UserRepository;
  private locationRepo: LocationRepository;

  constructor(db: DrizzleDb, private log: FastifyBaseLogger) {
    this.userRepo = new UserRepository(db);
    this.locationRepo = new LocationRepository(db);
  }

  async editUser(userId: string, input: EditUserInput): Promise<User> {
    if (input.username && await this.userRepo.isUsernameTaken(input.username, userId)) {
      throw new ConflictError('El nombre de usuario ya está en uso');
    }

    // Self-service edits always leave the account as a regular user
    const updated = await this.userRepo.updateUser(userId, {
      username: input.username,
      role: input.role,
      tipoUsuario: 'Regular',
    });
    if (!updated) {
      throw new NotFoundError('Perfil de usuario no encontrado');
    }
    this.log.info({ userId, fields: Object.keys(input) }, '[ProfileEditService] User updated');
    return updated;
  }

  async editLocation(userId: string, input: EditLocationInput): Promise<Location> {
    await this.requireUser(userId);
    return this.locationRepo.replaceForUser(userId, {
      nombre: input.nombre,
      descripcion: input.descripcion ?? null,
      plusCode: input.ubicacion,
      comuna: input.comuna ?? null,
    });
  }

  async editContact(userId: string, input: EditContactInput): Promise<ContactInfo> {
    await this.requireUser(userId);
    return this.userRepo.upsertContact(userId, {
      nombreCompleto: input.nombre_completo,
      nombreEmpresa: input.nombre_empresa,
      correoPrincipal: input.correo_principal,
      telefonoPrincipal: input.telefono_principal,
      direccion: input.direccion,
      comuna: input.comuna,
      region: input.region,
    });
  }

  async getOwnUsers(userId: string): Promise<User[]> {
    const user = await this.userRepo.getUser(userId);
    return user ? [user] : [];
  }

  async getOwnContacts(userId: string): Promise<ContactInfo[]> {
    const contact = await this.userRepo.getContact(userId);
    return contact ? [contact] : [];
  }

  async getOwnLocations(userId: string): Promise<Location[]> {
    return this.locationRepo.listForUser(userId);
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.userRepo.getUser(userId);
    if (!user) {
      throw new NotFoundError('Perfil de usuario no encontrado');
    }
    return user;
  }
}
