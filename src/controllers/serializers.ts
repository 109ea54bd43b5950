// ============================================
// MELIAPP - Wire Serializers (domain -> JSON field names)
// ============================================

import type { Lot } from '../repositories/lot.repository.js';
import type { User, ContactInfo } from '../repositories/user.repository.js';
import type { Location } from '../repositories/location.repository.js';
import type { Account } from '../services/auth.service.js';
import type { IdentitySession } from '../services/identity.provider.js';
import type { FullProfile } from '../services/search.service.js';
import type { LotSummary } from '../types/index.js';

export function toLotSummary(lot: Lot): LotSummary {
  return {
    id: lot.id,
    nombre_miel: lot.nombreMiel,
    orden_miel: lot.ordenMiel,
    temporada: lot.temporada,
    anio: lot.anio,
    kg_producidos: lot.kgProducidos,
  };
}

export function toLotDetail(lot: Lot) {
  return {
    ...toLotSummary(lot),
    auth_user_id: lot.userId,
    created_at: lot.createdAt.toISOString(),
    updated_at: lot.updatedAt.toISOString(),
  };
}

export function toAccountJson(account: Account) {
  return {
    id: account.id,
    username: account.username,
    email: account.email,
    role: account.role,
    nombre_completo: account.nombreCompleto,
    nombre_empresa: account.nombreEmpresa,
  };
}

export function toSessionJson(session: IdentitySession) {
  return {
    access_token: session.accessToken,
    refresh_token: session.refreshToken,
    expires_at: session.expiresAt,
  };
}

export function toUserJson(user: User) {
  return {
    auth_user_id: user.id,
    username: user.username,
    tipo_usuario: user.tipoUsuario,
    role: user.role,
    status: user.status,
    activo: user.activo,
    created_at: user.createdAt.toISOString(),
  };
}

export function toContactJson(contact: ContactInfo) {
  return {
    nombre_completo: contact.nombreCompleto,
    nombre_empresa: contact.nombreEmpresa,
    correo_principal: contact.correoPrincipal,
    telefono_principal: contact.telefonoPrincipal,
    direccion: contact.direccion,
    comuna: contact.comuna,
    region: contact.region,
  };
}

export function toLocationJson(location: Location) {
  return {
    id: location.id,
    nombre: location.nombre,
    descripcion: location.descripcion,
    norma_geo: location.plusCode,
    comuna: location.comuna,
    latitud: location.latitud,
    longitud: location.longitud,
  };
}

// Flat public profile: user fields merged with contact fields
export function toPublicProfileJson(user: User, contact: ContactInfo | null) {
  return {
    ...toUserJson(user),
    nombre_completo: contact?.nombreCompleto ?? null,
    nombre_empresa: contact?.nombreEmpresa ?? null,
    correo_principal: contact?.correoPrincipal ?? null,
    telefono_principal: contact?.telefonoPrincipal ?? null,
    direccion: contact?.direccion ?? null,
    comuna: contact?.comuna ?? null,
    region: contact?.region ?? null,
  };
}

export function toFullProfileJson(profile: FullProfile, qrUrl: string) {
  return {
    user: toUserJson(profile.user),
    contact_info: profile.contact ? toContactJson(profile.contact) : null,
    locations: profile.locations.map(toLocationJson),
    production: profile.production.map(p => ({
      id: p.id,
      temporada: p.temporada,
      cantidad_kg: p.cantidadKg,
      descripcion: p.descripcion,
    })),
    botanical_origins: profile.botanicalOrigins.map(o => ({
      id: o.id,
      especie: o.especie,
      comuna: o.comuna,
      descripcion: o.descripcion,
    })),
    lots: profile.lots.map(toLotSummary),
    requests: profile.requests.map(r => ({
      id: r.id,
      nombre_completo: r.nombreCompleto,
      nombre_empresa: r.nombreEmpresa,
      region: r.region,
      comuna: r.comuna,
      status: r.status,
      created_at: r.createdAt.toISOString(),
    })),
    produccion_total: profile.produccionTotal,
    comuna: profile.comuna,
    qr_url: qrUrl,
  };
}
