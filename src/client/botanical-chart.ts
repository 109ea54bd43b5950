// ============================================
// MELIAPP - Botanical Classes Chart (browser)
// ============================================

import type { ApiResponse, BotanicalClassView, BotanicalClassesPayload } from '../types/index.js';
import type { Composition } from '../shared/composition.js';
import { apiCall, defaultFetch, type FetchFn } from './api.js';
import { escapeHtml } from './escape.js';

const CATEGORY_PRIORITY: Record<string, number> = {
  'Leñosa': 1,
  'Leñosa Mixta': 2,
  'Herbácea': 3,
  'Mixta': 4,
};
const DEFAULT_PRIORITY = 5;

export const CHART_MESSAGES = {
  noComuna: 'Comuna no especificada',
  unknownComuna: 'Comuna no registrada',
  noData: 'No hay datos disponibles para esta comuna',
  loadError: 'Error al cargar datos',
} as const;

type ChartState =
  | { kind: 'idle' }
  | { kind: 'loading'; comuna: string }
  | { kind: 'message'; message: string }
  | { kind: 'ready'; comuna: string; classes: BotanicalClassView[] };

export interface BotanicalChartOptions {
  fetchFn?: FetchFn;
}

function priorityOf(categoria: string): number {
  return CATEGORY_PRIORITY[categoria] ?? DEFAULT_PRIORITY;
}

// 63.2 -> "63.2%", 40 -> "40%", 12.3456 -> "12.35%"
export function formatPercentage(value: number): string {
  return `${Number(value.toFixed(2)).toString()}%`;
}

function clampWidth(value: number): number {
  return Math.min(100, Math.max(0, value));
}

/**
 * Species cards for one municipality, optionally overlaid with a lot's
 * pollen composition. The DOM is always rebuilt from state, so rendering
 * twice yields the same markup.
 */
export class BotanicalChart {
  private state: ChartState = { kind: 'idle' };
  private composition: Composition | null = null;
  private loadingComposition = false;
  private sequence = 0;
  private fetchFn: FetchFn;

  constructor(private container: HTMLElement, options: BotanicalChartOptions = {}) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
  }

  get currentState(): Readonly<ChartState> {
    return this.state;
  }

  async update(comuna: string): Promise<void> {
    const requested = comuna.trim();
    const seq = ++this.sequence;

    if (!requested) {
      this.setState({ kind: 'message', message: CHART_MESSAGES.noComuna });
      return;
    }

    this.setState({ kind: 'loading', comuna: requested });
    const body = await this.fetchClasses(requested);

    // A newer update() owns the chart now
    if (seq !== this.sequence) return;

    if (body === null) {
      this.setState({ kind: 'message', message: CHART_MESSAGES.loadError });
    } else if (!body.success) {
      this.setState({ kind: 'message', message: body.message || CHART_MESSAGES.unknownComuna });
    } else if (body.classes.length === 0) {
      this.setState({ kind: 'message', message: CHART_MESSAGES.noData });
    } else {
      const classes = [...body.classes].sort(
        (a, b) => priorityOf(a.categoria) - priorityOf(b.categoria)
      );
      this.setState({ kind: 'ready', comuna: body.comuna, classes });
    }
  }

  applyComposition(composition: Composition | null): void {
    this.composition = composition;
    this.loadingComposition = false;
    this.render();
  }

  setLoadingComposition(loading: boolean): void {
    this.loadingComposition = loading;
    this.render();
  }

  render(): void {
    this.container.innerHTML = this.toHtml();
  }

  private async fetchClasses(comuna: string): Promise<ApiResponse<BotanicalClassesPayload> | null> {
    try {
      return await apiCall<BotanicalClassesPayload>(
        `/api/botanical-classes/${encodeURIComponent(comuna)}`,
        {},
        this.fetchFn
      );
    } catch (err) {
      console.error('[BotanicalChart] Failed to load classes', err);
      return null;
    }
  }

  private setState(state: ChartState): void {
    this.state = state;
    this.render();
  }

  private toHtml(): string {
    switch (this.state.kind) {
      case 'idle':
        return '';
      case 'loading':
        return `<div class="chart-loading">Cargando datos para ${escapeHtml(this.state.comuna)}...</div>`;
      case 'message':
        return `<div class="chart-message"><p>${escapeHtml(this.state.message)}</p></div>`;
      case 'ready':
        return this.readyHtml(this.state.comuna, this.state.classes);
    }
  }

  private readyHtml(comuna: string, classes: BotanicalClassView[]): string {
    const cards = classes.map(cls => this.cardHtml(cls)).join('');
    const plural = classes.length !== 1 ? 's' : '';

    return `
      <div class="botanical-chart${this.loadingComposition ? ' is-loading' : ''}">
        <div class="botanical-chart-header">
          <h3>🌿 Clases Botánicas en ${escapeHtml(comuna)}</h3>
          <p>${classes.length} categoría${plural} identificada${plural}</p>
        </div>
        <div class="botanical-grid">${cards}</div>
        ${this.totalHtml()}
      </div>`;
  }

  private cardHtml(cls: BotanicalClassView): string {
    const color = escapeHtml(cls.color);
    const species = cls.especies.map(especie => this.speciesHtml(especie, color)).join('');

    return `
      <div class="class-card" data-clase="${escapeHtml(cls.clase)}" style="border-left-color: ${color};">
        <div class="class-header">
          <span class="class-icon">${escapeHtml(cls.icono)}</span>
          <div>
            <h4 style="color: ${color};">${escapeHtml(cls.titulo)}</h4>
            <p class="class-count">${cls.cantidad} especies</p>
          </div>
          ${this.loadingComposition ? '<span class="spinner"></span>' : ''}
        </div>
        <div class="species-list">${species}</div>
      </div>`;
  }

  private speciesHtml(especie: string, color: string): string {
    const name = escapeHtml(especie);
    const pct = this.composition && Object.hasOwn(this.composition, especie)
      ? this.composition[especie]
      : undefined;

    if (pct === undefined) {
      return `<span class="species-row" data-especie="${name}">${name}</span>`;
    }
    return `
      <div class="species-row has-pct" data-especie="${name}">
        <div class="species-label"><span>${name}</span><span class="species-pct">${formatPercentage(pct)}</span></div>
        <div class="species-bar"><div class="species-bar-fill" style="width: ${clampWidth(pct)}%; background-color: ${color};"></div></div>
      </div>`;
  }

  private totalHtml(): string {
    if (!this.composition) return '';

    const values = Object.values(this.composition);
    const total = values.reduce((sum, v) => sum + v, 0);
    return `
      <div class="composition-total">
        <span class="composition-total-label">Composición Total</span>
        <strong class="composition-total-value">${formatPercentage(total)}</strong>
        <span class="composition-total-count">${values.length} especies</span>
      </div>`;
  }
}
