import { Agent, request } from 'undici';
import type { HostAddress } from '../hostUrl';
import type { TlsOptions } from '../tls';
import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export class UnsupportedProtocolError extends Error {
  constructor(readonly scheme: string) {
    super(`protocol not available: ${scheme}`);
    this.name = 'UnsupportedProtocolError';
  }
}

export interface UndiciTransportOptions {
  tls?: TlsOptions;
  connectTimeoutMs?: number;
}

const SOCKET_HOSTNAME = 'localhost';

/** `//./pipe/docker_engine` → `\\.\pipe\docker_engine` */
export function toPipePath(host: string): string {
  return host.replace(/\//g, '\\');
}

/**
 * Origin requests are addressed to. Socket and pipe transports ignore the
 * hostname, so a fixed placeholder is used.
 */
export function baseUrlFor(address: HostAddress, tls?: TlsOptions): string {
  const basePath = address.path.replace(/\/+$/, '');
  switch (address.scheme) {
    case 'unix':
    case 'npipe':
      return `http://${SOCKET_HOSTNAME}${basePath}`;
    case 'https':
      return `https://${address.host}${basePath}`;
    default:
      return `${tls ? 'https' : 'http'}://${address.host}${basePath}`;
  }
}

/** Agent options for `address`, or undefined when the scheme cannot be dialled. */
export function agentOptionsFor(address: HostAddress, options: UndiciTransportOptions = {}): Agent.Options | undefined {
  const timeout = options.connectTimeoutMs;
  switch (address.scheme) {
    case 'unix':
      return { connect: { socketPath: address.host, timeout } };
    case 'npipe':
      return { connect: { socketPath: toPipePath(address.host), timeout } };
    case 'tcp':
    case 'http':
    case 'https':
      return { connect: { ...options.tls, timeout } };
    default:
      return undefined;
  }
}

function normalizeHeaders(source: Record<string, string | string[] | undefined>): HttpHeaders {
  const headers: HttpHeaders = {};
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

/**
 * Creates an undici-based transport bound to one daemon address. One Agent
 * (and so one connection pool) is shared by every request of the client.
 * undici does not follow redirects unless asked to, which leaves redirect
 * handling to HttpClient.
 */
export function createUndiciTransport(address: HostAddress, options: UndiciTransportOptions = {}): HttpTransport {
  const agentOptions = agentOptionsFor(address, options);
  const agent = agentOptions ? new Agent(agentOptions) : undefined;

  const transport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    if (!agent) {
      throw new UnsupportedProtocolError(address.scheme);
    }

    const response = await request(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body ? Buffer.from(req.body) : undefined,
      signal,
      dispatcher: agent,
    });

    const body = await response.body.arrayBuffer();

    return {
      status: response.statusCode,
      headers: normalizeHeaders(response.headers),
      body,
    };
  };

  transport.close = async () => {
    await agent?.close();
  };

  return transport;
}
