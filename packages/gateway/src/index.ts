export * from './errors';
export * from './mac';
export * from './types';
export * from './logging';
export { AUTH_HEADER, ApiRejectedError, createGatewayHttp } from './http';
export type { GatewayHttp, GatewayHttpOptions, GatewayRequest, HttpMethod } from './http';
export { buildEndpoint, discoverGateway } from './discovery';
export { signChallenge } from './session/signature';
export { SessionManager } from './session/sessionManager';
export type {
  AuthenticatedSession,
  SessionManagerOptions,
  SessionResult,
  SessionState,
  SessionStatus
} from './session/sessionManager';
export { createCredentialStore, nodeCredentialFs } from './credentials/credentialStore';
export type { CredentialFs, CredentialStore, CredentialStoreOptions } from './credentials/credentialStore';
export { BLOCK_TYPE, blockEntriesFor, isBlacklisted, normalizeFilterList, normalizeHosts } from './enforcement/filterList';
export type { NormalizedFilterList } from './enforcement/filterList';
export { createEnforcementClient } from './enforcement/enforcementClient';
export type { EnforcementClient, EnforcementClientOptions } from './enforcement/enforcementClient';
