import { resolveConfigFromEnv, type EngineClientConfig } from './config';
import { EngineClient } from './EngineClient';
import type { Logger, LoggerMeta } from './types';

/**
 * Console logger used when no logger is supplied to the factories.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta);
  }
}

/**
 * Creates an EngineClient with a console logger.
 *
 * @example
 * ```typescript
 * const client = createEngineClient({
 *   host: 'tcp://127.0.0.1:2375',
 *   negotiateVersion: true,
 * });
 *
 * const changes = await client.containerChanges('web-1');
 * ```
 */
export function createEngineClient(config: EngineClientConfig = {}): EngineClient {
  return new EngineClient({
    ...config,
    logger: config.logger ?? new ConsoleLogger(),
  });
}

/**
 * Creates an EngineClient from `DOCKER_HOST`, `DOCKER_API_VERSION`,
 * `DOCKER_CERT_PATH` and `DOCKER_TLS_VERIFY`, with `overrides` applied last.
 */
export function createEngineClientFromEnv(
  overrides: EngineClientConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineClient {
  return createEngineClient(resolveConfigFromEnv(overrides, env));
}
