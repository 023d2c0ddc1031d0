/**
 * OpenID Connect Provider core, assembled
 *
 * Builds the session manager, claims interface, UserInfo endpoint and
 * signing keys from one provider configuration and mounts the HTTP routes
 * on a Hono app.
 */

import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { ErrorCode, OidcError, errorJson } from '../errors'
import type { SerializedSigningKey } from '../jwt/signing'
import { SigningKeyManager } from '../jwt/signing'
import type { ProviderConfig } from './config'
import { resolveProviderConfig } from './config'
import type { Clock } from './helpers'
import type { ClientStore, UserInfoStore } from './storage'
import { MemoryClientStore, MemoryUserInfoStore } from './storage'
import { ScopeRegistry } from './scopes'
import { SessionManager } from './session-manager'
import { createTokenHandlers } from './token-handler'
import { ClaimsInterface } from './claims'
import { UserInfoEndpoint } from './userinfo'
import type { ServerContext } from './routes/context'
import { createDiscoveryRoutes } from './routes/discovery'
import { createUserInfoRoutes } from './routes/userinfo'

export interface OidcServerOptions {
  /** Provider configuration, raw (validated here) or already resolved */
  provider: unknown
  /** User attribute store (default: empty in-memory store) */
  users?: UserInfoStore | undefined
  /** Client registry (default: empty in-memory registry) */
  clients?: ClientStore | undefined
  /** Signing keys to start from; missing algorithms get fresh keys */
  signingKeys?: SerializedSigningKey[] | undefined
  /** Time source in seconds (default: wall clock) */
  clock?: Clock | undefined
  /** Allowed CORS origins (default: the issuer's origin) */
  allowedOrigins?: string[] | undefined
}

export interface OidcServer {
  app: Hono
  config: ProviderConfig
  sessionManager: SessionManager
  claimsInterface: ClaimsInterface
  userinfo: UserInfoEndpoint
  scopes: ScopeRegistry
  users: UserInfoStore
  clients: ClientStore
  signer: SigningKeyManager
}

/**
 * Create an OpenID Connect Provider core
 *
 * @example
 * ```typescript
 * const { app, sessionManager } = createOidcServer({
 *   provider: { issuer: 'https://op.example.com', tokenKey: process.env.TOKEN_KEY },
 *   users: MemoryUserInfoStore.fromJSON(userRecords),
 *   clients: MemoryClientStore.fromJSON(clientRecords),
 * })
 *
 * serve({ fetch: app.fetch, port: 8080 })
 * ```
 */
export function createOidcServer(options: OidcServerOptions): OidcServer {
  const config = resolveProviderConfig(options.provider)
  const {
    users = new MemoryUserInfoStore(),
    clients = new MemoryClientStore(),
    signingKeys = [],
    clock,
    allowedOrigins = [new URL(config.issuer).origin],
  } = options
  const { debug } = config

  const scopes = new ScopeRegistry(config.extensionScopes)

  const sessionManager = new SessionManager({
    tokenHandlers: createTokenHandlers(config.tokenKey, config.tokenLifetimes),
    subjectSalt: config.subjectSalt,
    clients,
    clock,
    debug,
  })

  const claimsInterface = new ClaimsInterface({
    sessionManager,
    users,
    scopes,
    claimsSupported: config.claimsSupported,
    addClaimsByScope: config.addClaimsByScope,
    baseClaims: config.baseClaims,
    debug,
  })

  const signer = new SigningKeyManager(config.userinfoSigningAlgValuesSupported, signingKeys)

  const userinfo = new UserInfoEndpoint({
    sessionManager,
    claimsInterface,
    clients,
    signer,
    issuer: config.issuer,
    bearerMethods: config.bearerMethods,
    signingAlgs: config.userinfoSigningAlgValuesSupported,
    debug,
  })

  // ═══════════════════════════════════════════════════════════════════════════
  // HTTP
  // ═══════════════════════════════════════════════════════════════════════════

  const app = new Hono()

  app.use(
    '*',
    cors({
      origin: (origin) => {
        if (allowedOrigins.includes('*')) {
          return origin || '*'
        }
        if (origin && allowedOrigins.includes(origin)) {
          return origin
        }
        return null
      },
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization'],
      exposeHeaders: ['WWW-Authenticate'],
    }),
  )

  app.onError((err) => {
    if (debug) {
      console.error('[OIDC] Unhandled error:', err)
    }
    if (err instanceof OidcError && err.code !== ErrorCode.ConfigurationError) {
      return errorJson(err.code, err.message, 400)
    }
    return errorJson(ErrorCode.ServerError, 'Internal server error', 500)
  })

  const ctx: ServerContext = { config, scopes, signer, userinfo }
  app.route('/', createDiscoveryRoutes(ctx))
  app.route('/', createUserInfoRoutes(ctx))

  if (debug) {
    console.log('[OIDC] Provider ready:', { issuer: config.issuer, scopes: scopes.scopes() })
  }

  return { app, config, sessionManager, claimsInterface, userinfo, scopes, users, clients, signer }
}
