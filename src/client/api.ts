// ============================================
// MELIAPP - API Client (browser)
// ============================================

import type { ApiResponse } from '../types/index.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

// Wrapped so instances can keep it as a property without rebinding `this`
export const defaultFetch: FetchFn = (input, init) => fetch(input, init);

const ACCESS_TOKEN_KEY = 'meliapp.access_token';
const REFRESH_TOKEN_KEY = 'meliapp.refresh_token';

export interface StoredSession {
  access_token: string;
  refresh_token?: string | null;
}

export function getAccessToken(): string | null {
  return localStorage.getItem(ACCESS_TOKEN_KEY);
}

export function storeSession(session: StoredSession): void {
  localStorage.setItem(ACCESS_TOKEN_KEY, session.access_token);
  if (session.refresh_token) {
    localStorage.setItem(REFRESH_TOKEN_KEY, session.refresh_token);
  }
}

export function clearSession(): void {
  localStorage.removeItem(ACCESS_TOKEN_KEY);
  localStorage.removeItem(REFRESH_TOKEN_KEY);
}

export interface ApiOptions {
  method?: string;
  body?: unknown;
  params?: Record<string, string | number>;
}

/**
 * Calls a JSON endpoint and returns the response envelope as sent, including
 * `success: false` bodies. Throws only when no envelope could be read.
 */
export async function apiCall<T extends object>(
  endpoint: string,
  options: ApiOptions = {},
  fetchFn: FetchFn = defaultFetch
): Promise<ApiResponse<T>> {
  let url = endpoint;
  if (options.params) {
    const searchParams = new URLSearchParams();
    Object.entries(options.params).forEach(([key, value]) => {
      searchParams.append(key, String(value));
    });
    url += `?${searchParams.toString()}`;
  }

  const headers: Record<string, string> = {};
  const token = getAccessToken();
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }
  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  const res = await fetchFn(url, {
    method: options.method ?? 'GET',
    headers,
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  });

  const body: ApiResponse<T> = await res.json();
  return body;
}
