/**
 * OpenID Connect Provider core
 *
 * Modules:
 *   - types           — Tokens, authentication events, sessions, client metadata
 *   - token-handler   — Per-kind token minting and decoding
 *   - grant           — One authorization transaction and its tokens
 *   - session-manager — Sessions, grants, token registry and revocation
 *   - subject         — public / pairwise / ephemeral `sub` derivation
 *   - scopes          — Standard and provider-registered scope → claims table
 *   - claims          — Claims Interface (which claims, and their values)
 *   - userinfo        — UserInfo endpoint (parse → process → respond)
 *   - config          — Provider configuration and defaults
 *   - storage         — User attribute and client stores
 *   - server          — createOidcServer factory + Hono routes
 *   - guards          — Runtime type guards for JSON validation
 *
 * @module oidc
 */

// Core types
export type {
  TokenKind,
  SubjectType,
  ClaimsUsage,
  UserClaims,
  Token,
  AuthenticationEvent,
  AuthorizationRequest,
  ClientMetadata,
  SessionInfo,
} from './types'
export { TOKEN_KINDS, SUBJECT_TYPES, CLAIMS_USAGES } from './types'

// Token handlers
export { DefaultTokenHandler, createTokenHandlers } from './token-handler'
export type { TokenHandler, TokenHandlerOptions, TokenPayload, MintOptions } from './token-handler'

// Sessions, grants and subjects
export { SessionManager } from './session-manager'
export type { SessionManagerConfig, CreateSessionOptions, MintTokenOptions, ResolvedToken } from './session-manager'
export { Grant } from './grant'
export type { GrantInit } from './grant'
export { deriveSubject } from './subject'
export type { SubjectInput } from './subject'
export {
  createAuthnEvent,
  isAuthnEventValid,
  extendAuthnEvent,
  DEFAULT_AUTHN_EVENT_LIFETIME,
  INTERNET_PROTOCOL_PASSWORD,
} from './authn-event'
export type { AuthnEventOptions } from './authn-event'

// Claims
export { STANDARD_SCOPE_CLAIMS, ScopeRegistry } from './scopes'
export { ClaimsInterface } from './claims'
export type { ClaimsInterfaceConfig } from './claims'

// UserInfo
export { UserInfoEndpoint } from './userinfo'
export type {
  HttpInfo,
  UserInfoRequest,
  UserInfoErrorArgs,
  UserInfoProcessResult,
  UserInfoResponse,
  UserInfoEndpointConfig,
} from './userinfo'

// Configuration
export { resolveProviderConfig, SUPPORTED_SIGNING_ALGS } from './config'
export type { ProviderConfig, ProviderConfigInput, BearerMethod, UserInfoSigningAlg } from './config'

// Storage
export { MemoryUserInfoStore, MemoryClientStore } from './storage'
export type { UserInfoStore, ClientStore } from './storage'

// Server factory
export { createOidcServer } from './server'
export type { OidcServer, OidcServerOptions } from './server'
export type { ServerContext } from './routes/context'

// Helpers
export { parseScope, resolveSectorIdentifier, nowSeconds } from './helpers'
export type { Clock } from './helpers'
export { ValidationError, assertValid } from './guards'
