import { z } from 'zod';
import { buildApiPath } from './apiPath';
import type { EngineClientConfig } from './config';
import { HttpClient, HttpError } from './HttpClient';
import { defaultHost, parseHostUrl, type HostAddress } from './hostUrl';
import { createHeadersInterceptor, createUserAgentInterceptor } from './interceptors';
import { baseUrlFor, createUndiciTransport } from './transport/undiciTransport';
import type { HttpHeaders, HttpMethod, HttpRequestInterceptor, QueryParams, RawHttpResponse } from './types';
import { VersionNegotiator, type NegotiationState, type PingResult } from './versionNegotiator';

export const ChangeKind = {
  Modified: 0,
  Added: 1,
  Deleted: 2,
} as const;

export type ChangeKind = (typeof ChangeKind)[keyof typeof ChangeKind];

export interface ContainerChange {
  path: string;
  kind: ChangeKind;
}

const containerChangesSchema = z
  .array(
    z.object({
      Path: z.string(),
      Kind: z.union([z.literal(0), z.literal(1), z.literal(2)]),
    }),
  )
  .nullable();

const systemInfoSchema = z
  .object({
    ID: z.string().optional(),
    Name: z.string().optional(),
    ServerVersion: z.string().optional(),
    OperatingSystem: z.string().optional(),
    OSType: z.string().optional(),
    Architecture: z.string().optional(),
    Containers: z.number().optional(),
    Images: z.number().optional(),
  })
  .passthrough();

export type SystemInfo = z.infer<typeof systemInfoSchema>;

const errorBodySchema = z.object({ message: z.string() });

export interface EngineRequestOptions {
  method: HttpMethod;
  /** Unversioned path, e.g. `/containers/json`. */
  path: string;
  query?: QueryParams;
  headers?: HttpHeaders;
  body?: unknown;
  operation?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export function parsePingHeaders(headers: HttpHeaders): PingResult {
  return {
    apiVersion: headers['api-version'] || undefined,
    osType: headers['ostype'] || undefined,
    experimental: headers['docker-experimental'] === 'true',
    builderVersion: headers['builder-version'] || undefined,
    swarmStatus: headers['swarm'] || undefined,
  };
}

function decodeText(response: RawHttpResponse): string {
  return new TextDecoder().decode(response.body);
}

function parseJsonBody(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Client for a daemon's versioned REST API.
 *
 * Every versioned request first gives the VersionNegotiator a chance to
 * negotiate (a no-op unless negotiation is enabled and still pending), then
 * addresses itself with the version in effect at that moment.
 */
export class EngineClient {
  readonly hostAddress: HostAddress;
  private readonly host: string;
  private readonly http: HttpClient;
  private readonly negotiator: VersionNegotiator;

  constructor(config: EngineClientConfig = {}) {
    this.host = config.host ?? defaultHost();
    this.hostAddress = parseHostUrl(this.host);

    const interceptors: HttpRequestInterceptor[] = [...(config.interceptors ?? [])];
    if (config.headers) {
      interceptors.push(createHeadersInterceptor({ headers: config.headers }));
    }
    if (config.userAgent) {
      interceptors.push(createUserAgentInterceptor(config.userAgent));
    }

    this.http = new HttpClient({
      baseUrl: baseUrlFor(this.hostAddress, config.tls),
      transport:
        config.transport ??
        createUndiciTransport(this.hostAddress, { tls: config.tls, connectTimeoutMs: config.connectTimeoutMs }),
      interceptors,
      timeoutMs: config.timeoutMs,
      maxRedirects: config.maxRedirects,
      logger: config.logger,
      clientName: config.clientName,
    });

    this.negotiator = new VersionNegotiator({
      version: config.version,
      negotiate: config.negotiateVersion,
      ping: (signal) => this.ping(signal),
      logger: config.logger,
    });
  }

  /** The API version requests are currently addressed with. */
  clientVersion(): string {
    return this.negotiator.effectiveVersion();
  }

  daemonHost(): string {
    return this.host;
  }

  get negotiationState(): NegotiationState {
    return this.negotiator.state;
  }

  negotiateApiVersion(signal?: AbortSignal): Promise<void> {
    return this.negotiator.negotiate(signal);
  }

  negotiateApiVersionPing(ping: PingResult): void {
    this.negotiator.applyPing(ping);
  }

  /** Versioned wire path for `path` using the current version; no negotiation. */
  apiPath(path: string, query?: QueryParams): string {
    return buildApiPath(this.negotiator.effectiveVersion(), path, query);
  }

  /**
   * `HEAD /_ping`, retried as `GET` for daemons that reject HEAD. The ping
   * endpoint is unversioned and never triggers negotiation.
   */
  async ping(signal?: AbortSignal): Promise<PingResult> {
    let response = await this.http.send({ method: 'HEAD', path: '/_ping', operation: 'ping', signal });
    if (response.status === 405) {
      response = await this.http.send({ method: 'GET', path: '/_ping', operation: 'ping', signal });
    }
    this.assertOk(response, 'ping');
    return parsePingHeaders(response.headers);
  }

  /** Runs a versioned request and throws HttpError on a non-2xx status. */
  async request(opts: EngineRequestOptions): Promise<RawHttpResponse> {
    await this.negotiator.negotiate(opts.signal);
    const path = this.apiPath(opts.path, opts.query);

    const response = await this.http.send({
      method: opts.method,
      path,
      headers: opts.headers,
      body: opts.body,
      operation: opts.operation,
      timeoutMs: opts.timeoutMs,
      signal: opts.signal,
    });
    this.assertOk(response, opts.operation);
    return response;
  }

  async requestJson<S extends z.ZodTypeAny>(opts: EngineRequestOptions, schema: S): Promise<z.infer<S>> {
    const response = await this.request(opts);
    return schema.parse(parseJsonBody(decodeText(response)));
  }

  info(signal?: AbortSignal): Promise<SystemInfo> {
    return this.requestJson({ method: 'GET', path: '/info', operation: 'system.info', signal }, systemInfoSchema);
  }

  /** Filesystem changes of a container relative to its image. */
  async containerChanges(name: string, signal?: AbortSignal): Promise<ContainerChange[]> {
    const changes = await this.requestJson(
      { method: 'GET', path: `/containers/${name}/changes`, operation: 'container.changes', signal },
      containerChangesSchema,
    );
    return (changes ?? []).map((change) => ({ path: change.Path, kind: change.Kind }));
  }

  async close(): Promise<void> {
    await this.http.close();
  }

  private assertOk(response: RawHttpResponse, operation?: string): void {
    if (response.status >= 200 && response.status < 300) {
      return;
    }

    const body = response.body.byteLength > 0 ? parseJsonBody(decodeText(response)) : undefined;
    const daemonError = errorBodySchema.safeParse(body);
    const message = daemonError.success
      ? `Error response from daemon: ${daemonError.data.message}`
      : `HTTP ${response.status}`;

    throw new HttpError(message, {
      status: response.status,
      body,
      headers: response.headers,
      operation,
    });
  }
}
