import { readFileSync } from 'node:fs';
import path from 'node:path';

export interface TlsOptions {
  ca?: string | Buffer;
  cert?: string | Buffer;
  key?: string | Buffer;
  rejectUnauthorized: boolean;
}

export class TlsConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TlsConfigError';
  }
}

function readPem(file: string, what: string): Buffer {
  try {
    return readFileSync(file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TlsConfigError(`could not load ${what}: ${reason}`, { cause: error });
  }
}

/**
 * Loads `cert.pem`, `key.pem` and `ca.pem` from a certificate directory,
 * in that order.
 */
export function loadTlsFromCertPath(certPath: string, verify: boolean): TlsOptions {
  const cert = readPem(path.join(certPath, 'cert.pem'), 'TLS key pair');
  const key = readPem(path.join(certPath, 'key.pem'), 'TLS key pair');
  const ca = readPem(path.join(certPath, 'ca.pem'), 'CA certificate');
  return { ca, cert, key, rejectUnauthorized: verify };
}
