export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean | undefined | Array<string | number | boolean>;

export type QueryParams = Record<string, QueryValue>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Error category classification for daemon responses.
 *
 * - 'auth': 401, 403
 * - 'not_found': 404
 * - 'validation': 400, 422
 * - 'conflict': 409
 * - 'transient': 5xx
 * - 'unknown': anything else
 */
export type ErrorCategory = 'auth' | 'not_found' | 'validation' | 'conflict' | 'transient' | 'unknown';

/**
 * Transport layer raw HTTP response.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders; // lower-cased names
  body: ArrayBuffer;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: ArrayBuffer;
}

/**
 * Takes a transport request and abort signal, returns a raw HTTP response.
 * Transports must not follow redirects themselves; HttpClient owns that.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
  close?(): Promise<void>;
}

export interface HttpRequestOptions {
  method: HttpMethod;
  /** Request target, already versioned and escaped. */
  path: string;
  headers?: HttpHeaders;
  body?: unknown; // JSON-encoded unless ArrayBuffer or string
  operation?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface BeforeSendContext {
  request: HttpRequestOptions;
  signal: AbortSignal;
}

export interface AfterResponseContext {
  request: HttpRequestOptions;
  url: string;
  response: RawHttpResponse;
}

export interface OnErrorContext {
  request: HttpRequestOptions;
  error: unknown;
}

/**
 * Request interceptor for cross-cutting concerns.
 *
 * `beforeSend` runs in registration order and may mutate the request.
 * `afterResponse` and `onError` run in reverse registration order and only
 * observe. All hooks run once per logical request; redirect hops are not
 * separate requests.
 */
export interface HttpRequestInterceptor {
  beforeSend?(ctx: BeforeSendContext): Promise<void> | void;
  afterResponse?(ctx: AfterResponseContext): Promise<void> | void;
  onError?(ctx: OnErrorContext): Promise<void> | void;
}

export interface HttpClientConfig {
  baseUrl: string;
  transport: HttpTransport;
  interceptors?: HttpRequestInterceptor[];
  timeoutMs?: number;
  maxRedirects?: number;
  logger?: Logger;
  clientName?: string;
}
