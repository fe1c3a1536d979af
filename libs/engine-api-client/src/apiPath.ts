import type { QueryParams } from './types';
import { normalizeVersion, type ApiVersion } from './version';

// RFC 3986 pchar plus "/"
const PATH_SAFE = /^[A-Za-z0-9\-._~!$&'()*+,;=:@/]$/;

// U+FFFD, written in place of unpaired surrogates
const REPLACEMENT_CHARACTER = '%EF%BF%BD';

function isLoneSurrogate(char: string): boolean {
  const code = char.charCodeAt(0);
  return char.length === 1 && code >= 0xd800 && code <= 0xdfff;
}

/**
 * Percent-encodes a request path so that resource names survive transport:
 * `/networks/kiwl$%^` becomes `/networks/kiwl$%25%5E`.
 */
export function escapePath(path: string): string {
  let escaped = '';
  for (const char of path) {
    if (PATH_SAFE.test(char)) {
      escaped += char;
    } else {
      escaped += isLoneSurrogate(char) ? REPLACEMENT_CHARACTER : encodeURIComponent(char);
    }
  }
  return escaped;
}

export function encodeQuery(query?: QueryParams): string {
  if (!query) return '';
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const entry of value) {
        params.append(key, String(entry));
      }
    } else {
      params.append(key, String(value));
    }
  }
  return params.toString();
}

/**
 * Builds the versioned wire path: `/v<version><path>[?query]`.
 * `logicalPath` must start with "/".
 */
export function buildApiPath(version: ApiVersion | string, logicalPath: string, query?: QueryParams): string {
  const normalized = normalizeVersion(typeof version === 'string' ? version : version.value);
  const encodedQuery = encodeQuery(query);
  const path = `/v${normalized}${escapePath(logicalPath)}`;
  return encodedQuery ? `${path}?${encodedQuery}` : path;
}
