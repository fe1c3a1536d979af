import type { Logger } from './types';
import { ApiVersion, DEFAULT_API_VERSION, LEGACY_FLOOR_API_VERSION, minVersion } from './version';

export interface PingResult {
  apiVersion?: string;
  osType?: string;
  experimental: boolean;
  builderVersion?: string;
  swarmStatus?: string;
}

export type PingFn = (signal?: AbortSignal) => Promise<PingResult>;

interface PendingHandshake {
  done: Promise<void>;
  controller: AbortController;
  waiters: number;
}

export type NegotiationState =
  | { kind: 'unnegotiated' }
  | { kind: 'negotiated'; version: ApiVersion }
  | { kind: 'fixed'; version: ApiVersion };

export interface VersionNegotiatorOptions {
  /** Explicitly configured version; pins the state when non-empty. */
  version?: string;
  /** Negotiate with the daemon before the first versioned request. */
  negotiate?: boolean;
  defaultVersion?: string;
  ping: PingFn;
  logger?: Logger;
}

/**
 * Owns the effective API version of one client.
 *
 * `fixed` is never altered. `unnegotiated` moves to `negotiated` exactly once,
 * on the first successful ping; later pings are not issued. A failed
 * handshake leaves everything as it was so a later call can retry.
 */
export class VersionNegotiator {
  private current: NegotiationState;
  private readonly defaultVersion: ApiVersion;
  private readonly ping: PingFn;
  private readonly logger?: Logger;
  private inflight?: PendingHandshake;

  constructor(options: VersionNegotiatorOptions) {
    this.defaultVersion = ApiVersion.of(options.defaultVersion ?? DEFAULT_API_VERSION);
    this.ping = options.ping;
    this.logger = options.logger;

    const configured = ApiVersion.parse(options.version);
    if (configured) {
      this.current = { kind: 'fixed', version: configured };
    } else if (options.negotiate) {
      this.current = { kind: 'unnegotiated' };
    } else {
      this.current = { kind: 'fixed', version: this.defaultVersion };
    }
  }

  get state(): NegotiationState {
    return this.current;
  }

  effectiveVersion(): string {
    return this.current.kind === 'unnegotiated' ? this.defaultVersion.value : this.current.version.value;
  }

  /**
   * Pings the daemon once and locks in the resolved version. Resolves without
   * error when the handshake fails or `signal` aborts; the caller proceeds
   * with the version already in effect.
   *
   * Concurrent callers wait on one handshake. It runs under its own signal,
   * which aborts only once every waiter has given up.
   */
  async negotiate(signal?: AbortSignal): Promise<void> {
    if (this.current.kind !== 'unnegotiated' || signal?.aborted) {
      return;
    }

    const handshake = this.inflight ?? this.startHandshake();
    handshake.waiters += 1;
    const onAbort = () => {
      handshake.waiters -= 1;
      if (handshake.waiters === 0) {
        handshake.controller.abort(signal?.reason);
      }
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await waitUnlessAborted(handshake.done, signal);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Applies a ping result: a daemon reporting no version is treated as the
   * legacy floor, otherwise the lower of the reported and default versions
   * wins. No-op unless unnegotiated.
   */
  applyPing(ping: PingResult): void {
    if (this.current.kind !== 'unnegotiated') {
      return;
    }

    const reported = ApiVersion.parse(ping.apiVersion);
    const resolved = reported
      ? minVersion(this.defaultVersion, reported)
      : ApiVersion.of(LEGACY_FLOOR_API_VERSION);

    this.current = { kind: 'negotiated', version: resolved };
    this.logger?.debug('engine.negotiate.done', {
      reported: ping.apiVersion ?? null,
      version: resolved.value,
    });
  }

  private startHandshake(): PendingHandshake {
    const controller = new AbortController();
    const pending: PendingHandshake = { controller, waiters: 0, done: Promise.resolve() };
    pending.done = this.handshake(controller.signal).finally(() => {
      if (this.inflight === pending) {
        this.inflight = undefined;
      }
    });
    this.inflight = pending;
    return pending;
  }

  private async handshake(signal: AbortSignal): Promise<void> {
    try {
      const result = await this.ping(signal);
      this.applyPing(result);
    } catch (error) {
      this.logger?.warn('engine.negotiate.failed', {
        version: this.effectiveVersion(),
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function waitUnlessAborted(work: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return work;
  if (signal.aborted) return Promise.resolve();

  return new Promise<void>((resolve) => {
    const onAbort = () => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
    void work.finally(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
  });
}
