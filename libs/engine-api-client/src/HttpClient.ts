import { decideRedirect, isRedirectStatus, TooManyRedirectsError } from './redirectPolicy';
import type {
  ErrorCategory,
  HttpClientConfig,
  HttpHeaders,
  HttpMethod,
  HttpRequestInterceptor,
  HttpRequestOptions,
  HttpTransport,
  Logger,
  RawHttpResponse,
} from './types';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_REDIRECTS = 10;

const statusToCategory = (status: number): ErrorCategory => {
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 400 || status === 422) return 'validation';
  if (status === 409) return 'conflict';
  if (status >= 500) return 'transient';
  return 'unknown';
};

interface SendResult {
  url: string;
  response: RawHttpResponse;
}

/**
 * Minimal HTTP executor for daemon requests: interceptors, JSON bodies,
 * per-request timeout and redirect handling. Status codes are returned as
 * they are; callers decide what counts as an error.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly clientName: string;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;
  private readonly interceptors: HttpRequestInterceptor[];

  constructor(config: HttpClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.clientName = config.clientName ?? 'engine-api-client';
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRedirects = config.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.transport = config.transport;
    this.logger = config.logger;
    this.interceptors = [...(config.interceptors ?? [])];
  }

  async send(opts: HttpRequestOptions): Promise<RawHttpResponse> {
    const request: HttpRequestOptions = { ...opts, headers: { ...opts.headers } };

    const controller = new AbortController();
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    let didTimeout = false;
    const timeoutHandle = setTimeout(() => {
      didTimeout = true;
      controller.abort();
    }, timeoutMs);

    const onCallerAbort = () => controller.abort(request.signal?.reason);
    if (request.signal?.aborted) {
      controller.abort(request.signal.reason);
    } else {
      request.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      await this.applyBeforeSendInterceptors(request, controller.signal);
      const { url, response } = await this.followRedirects(request, controller.signal);
      await this.applyAfterResponseInterceptors(request, url, response);
      return response;
    } catch (error) {
      const finalError = didTimeout && !(error instanceof TimeoutError)
        ? new TimeoutError(`Request timed out after ${timeoutMs}ms`)
        : error;
      await this.runErrorInterceptors(request, finalError);
      throw finalError;
    } finally {
      clearTimeout(timeoutHandle);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  async close(): Promise<void> {
    await this.transport.close?.();
  }

  private async followRedirects(request: HttpRequestOptions, signal: AbortSignal): Promise<SendResult> {
    const headers = request.headers ?? {};
    let url = `${this.baseUrl}${request.path}`;
    let method: HttpMethod = request.method;
    let body = this.serializeBody(request.body, headers);

    for (let hop = 0; ; hop += 1) {
      this.logger?.debug('http.request.attempt', { ...this.baseLogMeta(request), url, hop });
      const response = await this.transport({ method, url, headers, body }, signal);

      if (!isRedirectStatus(response.status)) {
        return { url, response };
      }
      const location = response.headers.location;
      if (!location) {
        return { url, response };
      }

      const target = new URL(location, url).toString();
      const decision = decideRedirect(request.method, target);
      if (!decision.follow) {
        this.logger?.warn('http.redirect.refused', { ...this.baseLogMeta(request), status: response.status, target });
        throw decision.error;
      }
      if (hop >= this.maxRedirects) {
        throw new TooManyRedirectsError(target, this.maxRedirects);
      }

      this.logger?.debug('http.redirect.follow', { ...this.baseLogMeta(request), status: response.status, target });
      url = target;
      // Only GET and HEAD get here; 303 always turns into GET.
      method = response.status === 303 && method !== 'HEAD' ? 'GET' : method;
      body = undefined;
    }
  }

  private serializeBody(body: unknown, headers: HttpHeaders): ArrayBuffer | undefined {
    if (body === undefined || body === null) {
      return undefined;
    }
    if (body instanceof ArrayBuffer) {
      return body;
    }
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    if (typeof body !== 'string' && !this.hasHeader(headers, 'content-type')) {
      headers['Content-Type'] = 'application/json';
    }
    const encoded = new TextEncoder().encode(text);
    const buffer = new ArrayBuffer(encoded.byteLength);
    new Uint8Array(buffer).set(encoded);
    return buffer;
  }

  private hasHeader(headers: HttpHeaders, name: string): boolean {
    return Object.keys(headers).some((key) => key.toLowerCase() === name);
  }

  private async applyBeforeSendInterceptors(request: HttpRequestOptions, signal: AbortSignal): Promise<void> {
    for (const interceptor of this.interceptors) {
      await interceptor.beforeSend?.({ request, signal });
    }
  }

  private async applyAfterResponseInterceptors(
    request: HttpRequestOptions,
    url: string,
    response: RawHttpResponse,
  ): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      await interceptor.afterResponse?.({ request, url, response });
    }
  }

  private async runErrorInterceptors(request: HttpRequestOptions, error: unknown): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      try {
        await interceptor.onError?.({ request, error });
      } catch (interceptorError) {
        this.logger?.warn('http.interceptor.onError.failed', {
          ...this.baseLogMeta(request),
          error: interceptorError instanceof Error ? interceptorError.message : String(interceptorError),
        });
      }
    }
  }

  private baseLogMeta(opts: Pick<HttpRequestOptions, 'operation' | 'method' | 'path'>) {
    return {
      client: this.clientName,
      operation: opts.operation,
      method: opts.method,
      path: opts.path,
    };
  }
}

export class HttpError extends Error {
  status: number;
  body: unknown;
  headers: HttpHeaders;
  category: ErrorCategory;
  operation?: string;

  constructor(
    message: string,
    options: {
      status: number;
      body?: unknown;
      headers?: HttpHeaders;
      operation?: string;
    },
  ) {
    super(message);
    this.name = 'HttpError';
    this.status = options.status;
    this.body = options.body;
    this.headers = options.headers ?? {};
    this.category = statusToCategory(options.status);
    this.operation = options.operation;
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}
