// ============================================
// MELIAPP - Wire Types (shared by server and browser)
// ============================================

// Every JSON response is one of these two shapes
export type ApiSuccess<T extends object = object> = { success: true } & T;

export interface ApiFailure {
  success: false;
  code: string;
  message: string;
  details?: unknown;
  stack?: string;
}

export type ApiResponse<T extends object = object> = ApiSuccess<T> | ApiFailure;

export type BotanicalCategory =
  | 'Leñosa'
  | 'Leñosa Mixta'
  | 'Herbácea'
  | 'Mixta'
  | 'Otra';

export interface BotanicalClassView {
  clase: string;
  titulo: string;
  icono: string;
  color: string;
  descripcion: string;
  categoria: string;
  altura: string;
  especies: string[];
  cantidad: number;
}

export interface BotanicalClassesPayload {
  comuna: string;
  classes: BotanicalClassView[];
  total_classes: number;
}

export interface LotSummary {
  id: string;
  nombre_miel: string;
  orden_miel: number;
  temporada: number;
  anio: number;
  kg_producidos: number;
}

export interface LotListPayload {
  lotes: LotSummary[];
  total: number;
}

export interface LotClickPayload {
  lote_nombre: string;
  lote_orden: number;
}

export interface CompositionPayload {
  composicion: string;
  total: number;
}
