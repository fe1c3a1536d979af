export * from './types';
export * from './version';
export * from './hostUrl';
export * from './apiPath';
export * from './redirectPolicy';
export * from './versionNegotiator';
export * from './config';
export * from './tls';
export * from './interceptors';
export { HttpClient, HttpError, TimeoutError } from './HttpClient';
export * from './EngineClient';
export * from './factories';
export * from './transport/undiciTransport';
