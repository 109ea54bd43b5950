// ============================================
// MELIAPP - Profile Page Entry (browser)
// ============================================

import { apiCall } from './api.js';
import { escapeHtml } from './escape.js';
import { BotanicalChart } from './botanical-chart.js';
import { LotCarousel } from './lot-carousel.js';

interface FullProfilePayload {
  user: { auth_user_id: string; username: string; role: string };
  contact_info: {
    nombre_completo: string | null;
    nombre_empresa: string | null;
    correo_principal: string | null;
    telefono_principal: string | null;
    region: string | null;
  } | null;
  produccion_total: number;
  comuna: string | null;
  qr_url: string;
}

interface SessionPayload {
  logged_in: boolean;
  user?: { id: string };
}

interface OwnQrPayload {
  qr_code: string;
}

function userIdFromPath(pathname: string): string | null {
  const match = /^\/profile\/([^/]+)\/?$/.exec(pathname);
  return match ? decodeURIComponent(match[1]) : null;
}

function renderHeader(target: HTMLElement, profile: FullProfilePayload): void {
  const contact = profile.contact_info;
  const rows: [string, string | null][] = [
    ['Empresa', contact?.nombre_empresa ?? null],
    ['Correo', contact?.correo_principal ?? null],
    ['Teléfono', contact?.telefono_principal ?? null],
    ['Comuna', profile.comuna],
    ['Región', contact?.region ?? null],
    ['Producción total', `${profile.produccion_total} kg`],
  ];

  target.innerHTML = `
    <h1>${escapeHtml(contact?.nombre_completo ?? profile.user.username)}</h1>
    <p class="profile-role">${escapeHtml(profile.user.role)} · @${escapeHtml(profile.user.username)}</p>
    <dl class="profile-details">
      ${rows
        .filter((row): row is [string, string] => row[1] !== null && row[1] !== '')
        .map(([label, value]) => `<dt>${label}</dt><dd>${escapeHtml(value)}</dd>`)
        .join('')}
    </dl>`;
}

// The owner's QR needs the bearer token, so it is fetched as a data URL
async function showOwnQr(profile: FullProfilePayload, image: HTMLImageElement): Promise<void> {
  const session = await apiCall<SessionPayload>('/api/auth/session');
  if (!session.success || !session.logged_in || session.user?.id !== profile.user.auth_user_id) {
    return;
  }

  const qr = await apiCall<OwnQrPayload>(profile.qr_url, { params: { format: 'json' } });
  if (qr.success) {
    image.src = qr.qr_code;
    image.hidden = false;
  }
}

async function initProfilePage(): Promise<void> {
  const header = document.getElementById('profile-header');
  const chartContainer = document.getElementById('botanical-chart-container');
  const list = document.getElementById('lotes-carousel');
  const qrImage = document.getElementById('lote-qr');
  const ownQr = document.getElementById('profile-qr');
  const regenerate = document.getElementById('regenerate-qr');
  const userId = userIdFromPath(window.location.pathname);

  if (!header || !chartContainer || !list || !(qrImage instanceof HTMLImageElement) || !userId) {
    console.error('[ProfilePage] Page shell is missing required elements');
    return;
  }

  const profile = await apiCall<FullProfilePayload>(`/api/profile/${encodeURIComponent(userId)}/full`);
  if (!profile.success) {
    header.innerHTML = `<p class="profile-error">${escapeHtml(profile.message)}</p>`;
    return;
  }

  renderHeader(header, profile);
  chartContainer.dataset.comuna = profile.comuna ?? '';
  list.dataset.userId = profile.user.auth_user_id;

  const chart = new BotanicalChart(chartContainer);
  const carousel = new LotCarousel(
    { list, qrImage },
    { chart, initialLotId: new URLSearchParams(window.location.search).get('lote') }
  );
  regenerate?.addEventListener('click', () => carousel.regenerateQr());

  await Promise.all([
    chart.update(profile.comuna ?? ''),
    carousel.load(profile.user.auth_user_id),
    ownQr instanceof HTMLImageElement ? showOwnQr(profile, ownQr) : Promise.resolve(),
  ]);
}

document.addEventListener('DOMContentLoaded', () => {
  initProfilePage().catch((err: unknown) => {
    console.error('[ProfilePage] Initialisation failed', err);
  });
});
