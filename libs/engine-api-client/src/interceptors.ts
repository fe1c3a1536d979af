// ============================================================================
// Standard Interceptors
// ============================================================================

import type { BeforeSendContext, HttpHeaders, HttpRequestInterceptor } from './types';

function hasHeader(headers: HttpHeaders, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

// ============================================================================
// Custom Headers Interceptor
// ============================================================================

export interface HeadersInterceptorOptions {
  headers: HttpHeaders;
}

/**
 * Creates an interceptor that adds fixed headers to each request. Headers set
 * on the request itself take precedence (case-insensitive).
 *
 * @example
 * ```typescript
 * const client = createEngineClient({
 *   interceptors: [createHeadersInterceptor({ headers: { 'X-Trace': 'on' } })],
 * });
 * ```
 */
export function createHeadersInterceptor(opts: HeadersInterceptorOptions): HttpRequestInterceptor {
  return {
    beforeSend: (ctx: BeforeSendContext) => {
      if (!ctx.request.headers) {
        ctx.request.headers = {};
      }
      for (const [name, value] of Object.entries(opts.headers)) {
        if (!hasHeader(ctx.request.headers, name)) {
          ctx.request.headers[name] = value;
        }
      }
    },
  };
}

// ============================================================================
// User-Agent Interceptor
// ============================================================================

export function createUserAgentInterceptor(userAgent: string): HttpRequestInterceptor {
  return createHeadersInterceptor({ headers: { 'User-Agent': userAgent } });
}
