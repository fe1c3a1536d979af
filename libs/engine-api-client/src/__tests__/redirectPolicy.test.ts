import { describe, expect, it, vi } from 'vitest';
import { HttpClient } from '../HttpClient';
import { decideRedirect, isRedirectStatus, RedirectError, TooManyRedirectsError } from '../redirectPolicy';
import type { HttpMethod, RawHttpResponse, TransportRequest } from '../types';

const emptyBody = () => new ArrayBuffer(0);

const response = (status: number, headers: Record<string, string> = {}): RawHttpResponse => ({
  status,
  headers,
  body: emptyBody(),
});

// "/redirectme" answers 301 → "/bla"; "/bla" answers 404.
const redirectingTransport = () =>
  vi.fn(async (req: TransportRequest, _signal: AbortSignal) =>
    req.url.endsWith('/bla') ? response(404) : response(301, { location: '/bla' }),
  );

describe('decideRedirect', () => {
  it.each(['GET', 'HEAD', 'get'])('follows %s', (method) => {
    expect(decideRedirect(method, 'http://localhost/bla')).toEqual({ follow: true });
  });

  it.each(['POST', 'PUT', 'DELETE', 'PATCH'])('refuses %s', (method) => {
    const decision = decideRedirect(method, 'http://localhost/bla');
    expect(decision.follow).toBe(false);
    if (decision.follow) return;
    expect(decision.error).toBeInstanceOf(RedirectError);
    expect(decision.error.method).toBe(method);
    expect(decision.error.url).toBe('http://localhost/bla');
    expect(decision.error.message).toBe(`${method} "http://localhost/bla": unexpected redirect in response`);
  });

  it('recognizes redirect statuses', () => {
    expect([301, 302, 303, 307, 308].every(isRedirectStatus)).toBe(true);
    expect(isRedirectStatus(304)).toBe(false);
    expect(isRedirectStatus(200)).toBe(false);
  });
});

describe('HttpClient redirect handling', () => {
  it.each<HttpMethod>(['GET', 'HEAD'])('follows a redirect for %s and returns the final status', async (method) => {
    const transport = redirectingTransport();
    const client = new HttpClient({ baseUrl: 'http://localhost:2375', transport });

    const result = await client.send({ method, path: '/redirectme' });

    expect(result.status).toBe(404);
    expect(transport).toHaveBeenCalledTimes(2);
    expect(transport.mock.calls[1][0]).toMatchObject({ method, url: 'http://localhost:2375/bla' });
  });

  it.each<HttpMethod>(['POST', 'PUT', 'DELETE'])('refuses to follow a redirect for %s', async (method) => {
    const transport = redirectingTransport();
    const client = new HttpClient({ baseUrl: 'http://localhost:2375', transport });

    const error = await client.send({ method, path: '/redirectme', body: { name: 'web' } }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RedirectError);
    expect(error).toMatchObject({ method, url: 'http://localhost:2375/bla' });
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('returns a redirect without a Location header as is', async () => {
    const transport = vi.fn(async () => response(302));
    const client = new HttpClient({ baseUrl: 'http://localhost', transport });

    const result = await client.send({ method: 'GET', path: '/x' });

    expect(result.status).toBe(302);
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('stops after maxRedirects hops', async () => {
    const transport = vi.fn(async () => response(307, { location: '/loop' }));
    const client = new HttpClient({ baseUrl: 'http://localhost', transport, maxRedirects: 2 });

    const error = await client.send({ method: 'GET', path: '/loop' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TooManyRedirectsError);
    expect(transport).toHaveBeenCalledTimes(3);
  });

  it('logs a refused redirect', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const client = new HttpClient({ baseUrl: 'http://localhost', transport: redirectingTransport(), logger });

    await client.send({ method: 'POST', path: '/redirectme' }).catch(() => undefined);

    expect(logger.warn).toHaveBeenCalledWith(
      'http.redirect.refused',
      expect.objectContaining({ method: 'POST', status: 301, target: 'http://localhost/bla' }),
    );
  });
});
