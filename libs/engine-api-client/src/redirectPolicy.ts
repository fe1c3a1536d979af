import type { HttpMethod } from './types';

const FOLLOWABLE_METHODS = new Set<string>(['GET', 'HEAD']);

export class RedirectError extends Error {
  constructor(
    readonly method: string,
    readonly url: string,
  ) {
    super(`${method} "${url}": unexpected redirect in response`);
    this.name = 'RedirectError';
  }
}

export class TooManyRedirectsError extends Error {
  constructor(
    readonly url: string,
    readonly maxRedirects: number,
  ) {
    super(`stopped after ${maxRedirects} redirects at "${url}"`);
    this.name = 'TooManyRedirectsError';
  }
}

export type RedirectDecision = { follow: true } | { follow: false; error: RedirectError };

/**
 * Decides whether a redirect response may be followed.
 *
 * Only GET and HEAD are replayed against the new location; any other method
 * is refused with a RedirectError naming the target.
 */
export function decideRedirect(method: HttpMethod | string, target: string): RedirectDecision {
  const normalized = method.toUpperCase();
  if (FOLLOWABLE_METHODS.has(normalized)) {
    return { follow: true };
  }
  return { follow: false, error: new RedirectError(normalized, target) };
}

export function isRedirectStatus(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}
