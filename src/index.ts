/**
 * oidc-provider-core: the request and state core of an OpenID Connect Provider
 *
 * Sessions, grants and tokens; subject identifiers; scope-driven claim
 * release; and a UserInfo endpoint that can answer in plain JSON or as a
 * signed JWT.
 *
 * @example
 * ```typescript
 * import { createOidcServer, createAuthnEvent } from 'oidc-provider-core'
 *
 * const { app, sessionManager } = createOidcServer({ provider: config, users, clients })
 * const sessionId = await sessionManager.createSession(createAuthnEvent('diana'), request, 'diana')
 * const token = await sessionManager.mintToken(sessionId, 'access_token')
 * ```
 */

// Provider core
export * from './oidc'

// JWS signing and verification
export * from './jwt'

// Standardized error responses
export * from './errors'
