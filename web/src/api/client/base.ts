/**
 * Core API utilities: fetch wrapper and URL building.
 */

// API base URL resolution
export const API_BASE_URL = resolveApiBaseUrl();

export function resolveApiBaseUrl(): string {
  const explicit = (import.meta.env.VITE_API_BASE_URL ?? '').trim().replace(/\/$/, '');
  if (explicit) {
    return explicit;
  }

  if (typeof window !== 'undefined') {
    const url = new URL(window.location.href);
    if (url.port === '5173') {
      url.port = '8000';
      return url.origin.replace(/\/$/, '');
    }
    return url.origin.replace(/\/$/, '');
  }

  return '';
}

export function withBase(path: string): string {
  if (!path.startsWith('/')) {
    return `${API_BASE_URL}/${path}`;
  }
  return `${API_BASE_URL}${path}`;
}

export async function apiFetch(path: string, init: RequestInit = {}): Promise<Response> {
  const headers = new Headers(init.headers ?? {});
  return fetch(withBase(path), { ...init, headers });
}

export async function postJson(path: string, body: unknown, accept = 'application/json'): Promise<Response> {
  return apiFetch(path, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Accept: accept,
    },
    body: JSON.stringify(body),
  });
}

export async function ensureOk(response: Response, fallbackMessage: string): Promise<Response> {
  if (response.ok) {
    return response;
  }
  const message = (await response.text()).trim();
  throw new Error(message || `${fallbackMessage} (status ${response.status})`);
}

export async function handleResponse<T>(response: Response, isExpected: (value: unknown) => value is T): Promise<T> {
  await ensureOk(response, 'Request failed');
  const payload: unknown = await response.json();
  if (!isExpected(payload)) {
    throw new Error('Unexpected response payload');
  }
  return payload;
}
