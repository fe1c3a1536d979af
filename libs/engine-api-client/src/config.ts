import { z } from 'zod';
import { defaultHost } from './hostUrl';
import { loadTlsFromCertPath, type TlsOptions } from './tls';
import type { HttpHeaders, HttpRequestInterceptor, HttpTransport, Logger } from './types';

export const ENV_HOST = 'DOCKER_HOST';
export const ENV_API_VERSION = 'DOCKER_API_VERSION';
export const ENV_CERT_PATH = 'DOCKER_CERT_PATH';
export const ENV_TLS_VERIFY = 'DOCKER_TLS_VERIFY';

// An exported-but-empty variable means "unset".
const optionalEnv = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const engineEnvSchema = z.object({
  [ENV_HOST]: optionalEnv,
  [ENV_API_VERSION]: optionalEnv,
  [ENV_CERT_PATH]: optionalEnv,
  [ENV_TLS_VERIFY]: optionalEnv,
});

export type EngineEnv = z.infer<typeof engineEnvSchema>;

export interface EngineClientConfig {
  /** `unix:///…`, `npipe:////./pipe/…`, `tcp://host:port[/path]`; defaults per platform. */
  host?: string;
  /** Pins the API version and disables negotiation. */
  version?: string;
  /** Negotiate the API version with the daemon on the first request. */
  negotiateVersion?: boolean;
  tls?: TlsOptions;
  timeoutMs?: number;
  /** Time allowed to establish a connection to the daemon. */
  connectTimeoutMs?: number;
  maxRedirects?: number;
  headers?: HttpHeaders;
  userAgent?: string;
  logger?: Logger;
  /** `client` field of request log events; defaults to `engine-api-client`. */
  clientName?: string;
  /** Replaces the undici transport, e.g. in tests. */
  transport?: HttpTransport;
  interceptors?: HttpRequestInterceptor[];
}

export function readEngineEnv(env: NodeJS.ProcessEnv = process.env): EngineEnv {
  return engineEnvSchema.parse(env);
}

/**
 * Merges environment settings under explicit overrides. Version precedence
 * is explicit > environment > negotiation > default; an environment version
 * pins the client even when negotiation was requested.
 */
export function resolveConfigFromEnv(
  overrides: EngineClientConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineClientConfig {
  const parsed = readEngineEnv(env);
  const certPath = parsed[ENV_CERT_PATH];

  const tls =
    overrides.tls ??
    (certPath ? loadTlsFromCertPath(certPath, parsed[ENV_TLS_VERIFY] !== undefined) : undefined);

  return {
    ...overrides,
    host: overrides.host || parsed[ENV_HOST] || defaultHost(),
    version: overrides.version || parsed[ENV_API_VERSION],
    tls,
  };
}
