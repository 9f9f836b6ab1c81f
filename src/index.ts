export { RotatingClient, withRotatingClient } from './client';
export type { RequestOptions } from './client';
export { loadConfig, resolveRotationConfig } from './config';
export type { RotationConfig, RotationOptions, RotationStrategy, ServerConfig, ServerOptions } from './config';
export { discoverBackends, parseProxyList, DEFAULT_PROXY_SOURCES } from './discovery';
export type { DiscoveryOptions } from './discovery';
export { DispatchFrontend } from './dispatch';
export type { DispatchOutcome, DispatchRequest } from './dispatch';
export { RotationEngine, mergeHeaders } from './engine';
export type { DispatchState, EngineStats, ExecuteRequest, RelayResponse } from './engine';
export * from './errors';
export { DEFAULT_USER_AGENTS, IdentityPool } from './identity';
export { loadProxyFile, parseProxyLine, proxyLabel, proxyUrl } from './proxy';
export type { BackendDescriptor, BackendScheme } from './proxy';
export { RateLimiter } from './rateLimiter';
export { BackendRegistry } from './registry';
export type { BackendHealth, RegistrySnapshot } from './registry';
export { createApp, startServer } from './server';
export { parseTarget } from './target';
export { AxiosTransport } from './transport';
export type { Transport, TransportRequest, TransportResponse } from './transport';
