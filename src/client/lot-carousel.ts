// ============================================
// MELIAPP - Honey Lot Carousel (browser)
// ============================================

import type {
  CompositionPayload,
  LotClickPayload,
  LotListPayload,
  LotSummary,
} from '../types/index.js';
import { parseComposition, type Composition } from '../shared/composition.js';
import { apiCall, defaultFetch, type FetchFn } from './api.js';
import { escapeHtml } from './escape.js';
import { showToast } from './toast.js';
import type { BotanicalChart } from './botanical-chart.js';

export type CarouselState = 'unselected' | 'selected' | 'qr-displayed';

export const CAROUSEL_MESSAGES = {
  empty: 'Este usuario no tiene lotes registrados.',
  loadError: 'Error al cargar lotes.',
} as const;

export interface LotCarouselElements {
  list: HTMLElement;
  qrImage: HTMLImageElement;
}

export interface LotCarouselOptions {
  chart?: BotanicalChart;
  fetchFn?: FetchFn;
  initialLotId?: string | null;
  notify?: (message: string) => void;
}

/**
 * One button per lot. Selecting a lot records a click, overlays its
 * composition on the chart and shows its QR code. Only the most recent
 * selection may update the page.
 */
export class LotCarousel {
  private lots: LotSummary[] = [];
  private selected: LotSummary | null = null;
  private current: CarouselState = 'unselected';
  private sequence = 0;
  private fetchFn: FetchFn;
  private notify: (message: string) => void;

  constructor(private elements: LotCarouselElements, private options: LotCarouselOptions = {}) {
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.notify = options.notify ?? ((message) => { showToast(message); });

    elements.qrImage.addEventListener('load', () => {
      if (this.selected) {
        this.current = 'qr-displayed';
      }
    });
  }

  get state(): CarouselState {
    return this.current;
  }

  get selectedLot(): LotSummary | null {
    return this.selected;
  }

  async load(userId: string): Promise<void> {
    const lots = await this.fetchLots(userId);
    if (lots === null) {
      this.elements.list.innerHTML = `<p class="carousel-error">${CAROUSEL_MESSAGES.loadError}</p>`;
      return;
    }

    this.lots = lots;
    this.renderButtons();

    const initial = this.options.initialLotId
      ? this.lots.find(l => l.id === this.options.initialLotId)
      : undefined;
    if (initial) {
      await this.select(initial);
    }
  }

  async select(lot: LotSummary): Promise<void> {
    const seq = ++this.sequence;
    this.selected = lot;
    this.current = 'selected';
    this.markSelected(lot.id);

    const click = this.recordClick(lot, seq);
    this.options.chart?.setLoadingComposition(true);
    this.elements.qrImage.src = `/api/lote/${encodeURIComponent(lot.id)}/qr`;

    const composition = await this.fetchComposition(lot.id);
    if (seq === this.sequence) {
      this.options.chart?.applyComposition(composition);
    }
    await click;
  }

  regenerateQr(): void {
    if (!this.selected) return;
    this.current = 'selected';
    this.elements.qrImage.src = `/api/lote/${encodeURIComponent(this.selected.id)}/qr?t=${Date.now()}`;
  }

  private renderButtons(): void {
    const list = this.elements.list;
    list.innerHTML = '';

    if (this.lots.length === 0) {
      list.innerHTML = `<p class="carousel-empty">${CAROUSEL_MESSAGES.empty}</p>`;
      return;
    }

    for (const lot of this.lots) {
      const button = document.createElement('button');
      button.type = 'button';
      button.className = 'lot-button';
      button.dataset.lotId = lot.id;
      button.setAttribute('aria-pressed', 'false');
      button.innerHTML = `
        <span class="lot-order">${lot.orden_miel}</span>
        <span class="lot-name">${escapeHtml(lot.nombre_miel)}</span>`;
      button.addEventListener('click', () => {
        void this.select(lot);
      });
      list.appendChild(button);
    }
  }

  private markSelected(lotId: string): void {
    this.elements.list.querySelectorAll<HTMLButtonElement>('.lot-button').forEach(button => {
      const active = button.dataset.lotId === lotId;
      button.classList.toggle('is-selected', active);
      button.setAttribute('aria-pressed', String(active));
    });
  }

  private async fetchLots(userId: string): Promise<LotSummary[] | null> {
    try {
      const body = await apiCall<LotListPayload>(`/api/lotes/${encodeURIComponent(userId)}`, {}, this.fetchFn);
      return body.success ? body.lotes : null;
    } catch (err) {
      console.error('[LotCarousel] Failed to load lots', err);
      return null;
    }
  }

  // Best-effort: a failed click never blocks the selection
  private async recordClick(lot: LotSummary, seq: number): Promise<void> {
    try {
      const body = await apiCall<LotClickPayload>(
        `/api/lote/click/${encodeURIComponent(lot.id)}`,
        { method: 'POST' },
        this.fetchFn
      );
      if (!body.success) {
        console.warn('[LotCarousel] Click not recorded:', body.message);
        return;
      }
      if (seq === this.sequence) {
        this.notify(`Lote: ${lot.nombre_miel}`);
      }
    } catch (err) {
      console.warn('[LotCarousel] Click not recorded:', err);
    }
  }

  private async fetchComposition(lotId: string): Promise<Composition | null> {
    try {
      const body = await apiCall<CompositionPayload>(
        `/api/lote/composicion/${encodeURIComponent(lotId)}`,
        {},
        this.fetchFn
      );
      if (!body.success) {
        console.warn('[LotCarousel] Composition not available:', body.message);
        return null;
      }
      return parseComposition(body.composicion);
    } catch (err) {
      console.warn('[LotCarousel] Composition not available:', err);
      return null;
    }
  }
}
