// ============================================
// MELIAPP - Auth Pages Entry (browser)
// ============================================
// Serves login.html (also at /register), reset-password.html and
// auth-callback.html; each page carries data-page on <body>.

import { apiCall, storeSession } from './api.js';

interface SessionJson {
  access_token: string;
  refresh_token: string;
  expires_at: number | null;
}

interface LoginPayload {
  session: SessionJson;
  redirect_url: string;
}

interface RegisterPayload {
  message: string;
  session: SessionJson | null;
}

interface MessagePayload {
  message: string;
}

interface OAuthPayload {
  redirect_url: string;
}

export interface FragmentTokens {
  accessToken: string;
  refreshToken: string | null;
  type: string | null;
}

/**
 * Tokens the identity provider appends to redirect URLs, e.g.
 * "#access_token=abc&refresh_token=def&type=recovery".
 */
export function readFragmentTokens(hash: string): FragmentTokens | null {
  const params = new URLSearchParams(hash.replace(/^#/, ''));
  const accessToken = params.get('access_token');
  if (!accessToken) return null;
  return {
    accessToken,
    refreshToken: params.get('refresh_token'),
    type: params.get('type'),
  };
}

function formValues(form: HTMLFormElement): Record<string, string> {
  const values: Record<string, string> = {};
  new FormData(form).forEach((value, key) => {
    if (typeof value === 'string' && value.trim() !== '') {
      values[key] = value.trim();
    }
  });
  return values;
}

function showStatus(message: string, isError: boolean): void {
  const status = document.getElementById('auth-status');
  if (!status) return;
  status.textContent = message;
  status.classList.toggle('is-error', isError);
}

function onSubmit(formId: string, handler: (values: Record<string, string>) => Promise<void>): void {
  const form = document.getElementById(formId);
  if (!(form instanceof HTMLFormElement)) return;

  form.addEventListener('submit', (event) => {
    event.preventDefault();
    handler(formValues(form)).catch((err: unknown) => {
      console.error(`[Auth] ${formId} failed`, err);
      showStatus('No se pudo conectar con el servidor', true);
    });
  });
}

function initLoginPage(): void {
  const registerMode = window.location.pathname === '/register';
  document.body.classList.toggle('is-register', registerMode);

  onSubmit('login-form', async (values) => {
    const body = await apiCall<LoginPayload>('/api/auth/login', { method: 'POST', body: values });
    if (!body.success) {
      showStatus(body.message, true);
      return;
    }
    storeSession(body.session);
    window.location.href = body.redirect_url;
  });

  onSubmit('register-form', async (values) => {
    const body = await apiCall<RegisterPayload>('/api/auth/register', { method: 'POST', body: values });
    if (!body.success) {
      showStatus(body.message, true);
      return;
    }
    if (body.session) {
      storeSession(body.session);
      window.location.href = '/';
      return;
    }
    showStatus(body.message, false);
  });

  onSubmit('forgot-form', async (values) => {
    const body = await apiCall<MessagePayload>('/api/auth/forgot-password', { method: 'POST', body: values });
    showStatus(body.message, !body.success);
  });
}

function initResetPasswordPage(): void {
  const tokens = readFragmentTokens(window.location.hash);
  if (!tokens) {
    showStatus('El enlace de recuperación no es válido o ha expirado', true);
    return;
  }

  onSubmit('reset-form', async (values) => {
    const body = await apiCall<MessagePayload>('/api/auth/reset-password', {
      method: 'POST',
      body: { token: tokens.accessToken, password: values.password ?? '' },
    });
    showStatus(body.message, !body.success);
    if (body.success) {
      setTimeout(() => { window.location.href = '/login'; }, 1500);
    }
  });
}

async function completeOAuthCallback(): Promise<void> {
  const tokens = readFragmentTokens(window.location.hash);
  if (!tokens) {
    window.location.href = '/register';
    return;
  }

  storeSession({ access_token: tokens.accessToken, refresh_token: tokens.refreshToken });
  const body = await apiCall<OAuthPayload>('/api/auth/oauth/tokens', {
    method: 'POST',
    body: { access_token: tokens.accessToken, refresh_token: tokens.refreshToken ?? undefined },
  });
  window.location.href = body.success ? body.redirect_url : '/register';
}

document.addEventListener('DOMContentLoaded', () => {
  switch (document.body.dataset.page) {
    case 'login':
      initLoginPage();
      break;
    case 'reset-password':
      initResetPasswordPage();
      break;
    case 'auth-callback':
      completeOAuthCallback().catch((err: unknown) => {
        console.error('[Auth] OAuth callback failed', err);
        window.location.href = '/register';
      });
      break;
  }
});
