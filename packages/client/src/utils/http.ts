import ky, { type KyInstance, TimeoutError } from 'ky';
import { NetworkError } from '../errors/index.js';
import type { Session } from '../types/session.js';

/**
 * fetch-compatible function used as transport
 */
export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  /** Per-attempt timeout in milliseconds */
  timeout: number;
  /** Transport to dispatch requests with; defaults to the global fetch */
  fetch?: FetchLike;
  /** Headers added to every request */
  headers?: Record<string, string>;
}

/**
 * Create a ky instance for talking to the controller.
 *
 * ky's own retry is disabled and HTTP errors are not thrown: the request
 * sender owns the retry loop and the normalizer owns status interpretation.
 */
export function createKyInstance(options: HttpOptions): KyInstance {
  return ky.create({
    timeout: options.timeout,
    retry: 0,
    throwHttpErrors: false,
    headers: {
      Accept: 'application/json',
      ...options.headers,
    },
    ...(options.fetch ? { fetch: options.fetch } : {}),
  });
}

/**
 * Origin for a controller address. Addresses given with a scheme are kept as-is.
 */
export function controllerBaseUrl(address: string): string {
  const trimmed = address.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * ky rejects inputs starting with a slash when a prefixUrl is set
 */
export function toRelativePath(path: string): string {
  return path.replace(/^\/+/, '');
}

/**
 * `name=value` pairs of Set-Cookie values, attributes dropped
 */
export function cookiePairs(setCookies: readonly string[]): string[] {
  return setCookies
    .map((cookie) => cookie.split(';', 1)[0]?.trim() ?? '')
    .filter((pair) => pair.includes('='));
}

/**
 * Headers carrying the session on every call. Cookies set by the login are
 * replayed after `AuthCookie`, which always carries the session token.
 */
export function sessionHeaders(session: Session): Record<string, string> {
  const replayed = cookiePairs(session.cookies).filter(
    (pair) => !pair.startsWith('AuthCookie='),
  );
  return {
    Authorization: `Bearer ${session.token}`,
    Cookie: [`AuthCookie=${session.token}`, ...replayed].join('; '),
  };
}

export function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

/**
 * Transform an error thrown by ky/fetch into a NetworkError
 */
export function toNetworkError(error: unknown, timeout: number): NetworkError {
  if (error instanceof TimeoutError) {
    return new NetworkError(`Request timed out after ${timeout}ms`, error);
  }
  if (error instanceof Error) {
    return new NetworkError(error.message, error);
  }
  return new NetworkError(String(error));
}

/**
 * Parse a body as JSON. Empty bodies parse to null.
 */
export function parseJsonBody(text: string): { ok: true; value: unknown } | { ok: false } {
  if (text.trim() === '') {
    return { ok: true, value: null };
  }
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}
