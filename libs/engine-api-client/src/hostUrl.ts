export interface HostAddress {
  scheme: string;
  /** Authority for network schemes, socket or pipe path otherwise. */
  host: string;
  /** Base path prefixed to every request; empty when absent. */
  path: string;
}

export const DEFAULT_UNIX_HOST = 'unix:///var/run/docker.sock';
export const DEFAULT_NPIPE_HOST = 'npipe:////./pipe/docker_engine';

const NETWORK_SCHEMES = new Set(['tcp', 'http', 'https']);

export class HostParseError extends Error {
  constructor(readonly input: string) {
    super(`unable to parse host \`${input}\``);
    this.name = 'HostParseError';
  }
}

export function defaultHost(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? DEFAULT_NPIPE_HOST : DEFAULT_UNIX_HOST;
}

export function isNetworkScheme(scheme: string): boolean {
  return NETWORK_SCHEMES.has(scheme);
}

/**
 * Parses `scheme://rest` into a HostAddress.
 *
 * Network schemes (`tcp`, `http` and `https`) are split into authority and
 * base path; `http` and `https` take a base path exactly as `tcp` does. For
 * socket and pipe schemes the remainder is a filesystem-like path and is kept
 * whole: `unix:///var/run/docker.sock` has host `/var/run/docker.sock`.
 */
export function parseHostUrl(input: string): HostAddress {
  const separator = input.indexOf('://');
  if (separator <= 0) {
    throw new HostParseError(input);
  }

  const scheme = input.slice(0, separator);
  const rest = input.slice(separator + 3);

  if (!isNetworkScheme(scheme)) {
    return { scheme, host: rest, path: '' };
  }

  const slash = rest.indexOf('/');
  if (slash === -1) {
    return { scheme, host: rest, path: '' };
  }
  return { scheme, host: rest.slice(0, slash), path: rest.slice(slash) };
}
