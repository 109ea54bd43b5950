// ============================================
// MELIAPP - Search Page Entry (browser)
// ============================================

import { apiCall, clearSession, getAccessToken } from './api.js';
import { escapeHtml } from './escape.js';

const SUGGEST_DELAY_MS = 250;
const SUGGEST_MIN_LENGTH = 2;

interface Suggestion {
  id: string;
  nombre: string;
  especialidad: string;
}

interface SearchResult {
  _table: string;
  id: string;
  auth_user_id: string;
  title: string;
  subtitle: string | null;
}

const TABLE_LABELS: Record<string, string> = {
  usuarios: 'Usuario',
  info_contacto: 'Contacto',
  ubicaciones: 'Ubicación',
  origenes_botanicos: 'Origen botánico',
  solicitudes_apicultor: 'Solicitud',
  lotes: 'Lote',
};

export function renderSuggestions(target: HTMLElement, suggestions: Suggestion[]): void {
  target.innerHTML = suggestions
    .map(s => `
      <a class="suggestion" href="/profile/${encodeURIComponent(s.id)}">
        <span class="suggestion-name">${escapeHtml(s.nombre)}</span>
        <span class="suggestion-role">${escapeHtml(s.especialidad)}</span>
      </a>`)
    .join('');
  target.hidden = suggestions.length === 0;
}

export function renderResults(target: HTMLElement, query: string, results: SearchResult[]): void {
  if (results.length === 0) {
    target.innerHTML = `<p class="search-empty">Sin resultados para "${escapeHtml(query)}"</p>`;
    return;
  }

  target.innerHTML = results
    .map(r => `
      <a class="search-result" href="/profile/${encodeURIComponent(r.auth_user_id)}">
        <span class="search-result-table">${escapeHtml(TABLE_LABELS[r._table] ?? r._table)}</span>
        <strong>${escapeHtml(r.title)}</strong>
        ${r.subtitle ? `<span class="search-result-subtitle">${escapeHtml(r.subtitle)}</span>` : ''}
      </a>`)
    .join('');
}

function initSearchPage(): void {
  const form = document.getElementById('search-form');
  const input = document.getElementById('search-input');
  const suggestionsBox = document.getElementById('suggestions');
  const resultsBox = document.getElementById('search-results');
  const logout = document.getElementById('logout-button');

  if (!(form instanceof HTMLFormElement) || !(input instanceof HTMLInputElement) || !suggestionsBox || !resultsBox) {
    return;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  let latest = 0;

  input.addEventListener('input', () => {
    clearTimeout(timer);
    const q = input.value.trim();
    if (q.length < SUGGEST_MIN_LENGTH) {
      renderSuggestions(suggestionsBox, []);
      return;
    }

    timer = setTimeout(() => {
      const seq = ++latest;
      apiCall<{ suggestions: Suggestion[] }>('/sugerir', { params: { q } })
        .then(body => {
          if (seq === latest && body.success) {
            renderSuggestions(suggestionsBox, body.suggestions);
          }
        })
        .catch((err: unknown) => console.warn('[Search] Suggestions unavailable', err));
    }, SUGGEST_DELAY_MS);
  });

  form.addEventListener('submit', (event) => {
    event.preventDefault();
    const q = input.value.trim();
    if (!q) return;

    renderSuggestions(suggestionsBox, []);
    apiCall<{ results: SearchResult[] }>('/api/search', { params: { q } })
      .then(body => {
        if (body.success) {
          renderResults(resultsBox, q, body.results);
        } else {
          resultsBox.innerHTML = `<p class="search-error">${escapeHtml(body.message)}</p>`;
        }
      })
      .catch((err: unknown) => {
        console.error('[Search] Search failed', err);
        resultsBox.innerHTML = '<p class="search-error">Error al buscar</p>';
      });
  });

  if (logout) {
    logout.hidden = getAccessToken() === null;
    logout.addEventListener('click', () => {
      apiCall('/api/auth/logout', { method: 'POST' })
        .catch((err: unknown) => console.warn('[Search] Logout request failed', err))
        .finally(() => {
          clearSession();
          window.location.href = '/login';
        });
    });
  }
}

document.addEventListener('DOMContentLoaded', initSearchPage);
