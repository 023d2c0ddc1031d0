/**
 * Session Manager
 *
 * The authoritative registry of sessions, grants and tokens. A session binds
 * one user to one client under one subject policy and accumulates a grant
 * per authorization. Every token minted through the manager is appended to
 * its grant and recorded in a reverse index (token value → owner) so that a
 * bearer value can be resolved without scanning.
 *
 * Mutations happen in a single synchronous step after any awaited work, so a
 * concurrent reader sees either no token or a fully registered one.
 */

import {
  ConfigurationError,
  ErrorCode,
  ExpiredOrRevokedToken,
  GrantNotFound,
  OidcError,
  SessionNotFound,
  TokenAlreadyUsed,
  TokenNotFound,
  WrongTokenKind,
} from '../errors'
import type { AuthenticationEvent, AuthorizationRequest, SessionInfo, SubjectType, Token, TokenKind } from './types'
import { isSubjectType } from './guards'
import type { TokenHandler, TokenPayload } from './token-handler'
import type { ClientStore } from './storage'
import type { Clock } from './helpers'
import { nowSeconds, resolveSectorIdentifier, tokenPrefix } from './helpers'
import { generateToken, sha256Hex } from './crypto'
import { deriveSubject } from './subject'
import { Grant } from './grant'

/**
 * Configuration for the session manager
 */
export interface SessionManagerConfig {
  /** One handler per token kind */
  tokenHandlers: Record<TokenKind, TokenHandler>
  /** Salt mixed into subject identifiers */
  subjectSalt: string
  /** Client registry, consulted for sector identifiers (optional) */
  clients?: ClientStore | undefined
  /** Time source in seconds (default: wall clock) */
  clock?: Clock | undefined
  /** Enable debug logging */
  debug?: boolean | undefined
}

export interface CreateSessionOptions {
  /** Client the session is for (default: `client_id` of the request) */
  clientId?: string | undefined
  /** Subject policy (default: 'public') */
  subType?: SubjectType | undefined
  /** Sector identifier for pairwise subjects */
  sectorIdentifier?: string | undefined
  /** Scopes granted, when narrower than the request (default: request scope) */
  scope?: string[] | undefined
}

export interface MintTokenOptions {
  /** Expiry in seconds since epoch (default: now + handler lifetime) */
  expiresAt?: number | undefined
  /** Token this one is derived from */
  basedOn?: Token | string | undefined
  /** Grant to mint under (default: the session's newest grant) */
  grantId?: string | undefined
}

/**
 * Owner of a token value
 */
export interface ResolvedToken {
  session: SessionInfo
  grant: Grant
  token: Token
}

interface SessionRecord {
  info: SessionInfo
  grants: Map<string, Grant>
  latestGrantId?: string
}

interface IndexEntry {
  sessionId: string
  grantId: string
  token: Token
}

export class SessionManager {
  readonly tokenHandlers: Record<TokenKind, TokenHandler>
  private readonly subjectSalt: string
  private readonly clients: ClientStore | undefined
  private readonly clock: Clock
  private readonly debug: boolean
  private readonly sessions = new Map<string, SessionRecord>()
  private readonly tokenIndex = new Map<string, IndexEntry>()

  constructor(config: SessionManagerConfig) {
    const { tokenHandlers, subjectSalt, clients, clock = nowSeconds, debug = false } = config
    this.tokenHandlers = tokenHandlers
    this.subjectSalt = subjectSalt
    this.clients = clients
    this.clock = clock
    this.debug = debug
  }

  /** Current time according to the manager's clock */
  now(): number {
    return this.clock()
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Sessions
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Register an authentication for a user and client and return the
   * session id.
   *
   * The id depends only on the user, client, subject type and sector, so
   * repeated authorizations land in the same session; each call adds a new
   * grant to it.
   */
  async createSession(
    authnEvent: AuthenticationEvent,
    authzRequest: AuthorizationRequest,
    userId: string,
    options: CreateSessionOptions = {},
  ): Promise<string> {
    const clientId = options.clientId ?? authzRequest.client_id
    const subType = options.subType ?? 'public'

    if (!clientId) {
      throw new ConfigurationError('A client id is required to create a session')
    }
    if (!isSubjectType(subType)) {
      throw new ConfigurationError(`Unsupported subject type: ${subType}`)
    }

    let sectorIdentifier: string | undefined
    if (subType === 'pairwise') {
      const client = this.clients ? await this.clients.getClient(clientId) : null
      sectorIdentifier = resolveSectorIdentifier({
        explicit: options.sectorIdentifier,
        sectorIdentifierUri: authzRequest.sector_identifier_uri ?? client?.sector_identifier_uri,
        redirectUri: authzRequest.redirect_uri ?? client?.redirect_uris?.[0],
      })
      if (!sectorIdentifier) {
        throw new ConfigurationError('Pairwise subject type requires a resolvable sector identifier')
      }
    }

    const sessionId = await this.computeSessionId(userId, clientId, subType, sectorIdentifier)

    let record = this.sessions.get(sessionId)
    if (!record) {
      const nonce = subType === 'ephemeral' ? generateToken(32) : undefined
      const sub = await deriveSubject({
        userId,
        clientId,
        subType,
        salt: this.subjectSalt,
        sectorIdentifier,
        nonce,
      })
      // Another call may have registered the session while we were hashing
      record = this.sessions.get(sessionId) ?? {
        info: {
          sessionId,
          userId,
          clientId,
          subType,
          ...(sectorIdentifier !== undefined && { sectorIdentifier }),
          sub,
          createdAt: this.clock(),
        },
        grants: new Map(),
      }
      this.sessions.set(sessionId, record)
    }

    const grant = new Grant({
      id: generateToken(16),
      sub: record.info.sub,
      authenticationEvent: authnEvent,
      authorizationRequest: authzRequest,
      issuedAt: this.clock(),
      scope: options.scope,
    })
    record.grants.set(grant.id, grant)
    record.latestGrantId = grant.id

    if (this.debug) {
      console.log('[OIDC] Session created:', { sessionId, clientId, subType, grantId: grant.id })
    }

    return sessionId
  }

  private async computeSessionId(
    userId: string,
    clientId: string,
    subType: SubjectType,
    sectorIdentifier: string | undefined,
  ): Promise<string> {
    return sha256Hex(JSON.stringify([userId, clientId, subType, sectorIdentifier ?? null]))
  }

  private getRecord(sessionId: string): SessionRecord {
    const record = this.sessions.get(sessionId)
    if (!record) throw new SessionNotFound(sessionId)
    return record
  }

  /**
   * Session attributes
   */
  getSession(sessionId: string): SessionInfo {
    return { ...this.getRecord(sessionId).info }
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId)
  }

  /**
   * A grant of the session; the newest one when no grant id is given
   */
  getGrant(sessionId: string, grantId?: string): Grant {
    const record = this.getRecord(sessionId)
    const id = grantId ?? record.latestGrantId
    const grant = id !== undefined ? record.grants.get(id) : undefined
    if (!grant) throw new GrantNotFound(sessionId, grantId)
    return grant
  }

  /**
   * Every grant of the session, oldest first
   */
  listGrants(sessionId: string): Grant[] {
    return Array.from(this.getRecord(sessionId).grants.values())
  }

  getSessionInfo(sessionId: string, options: { grant: true; grantId?: string }): SessionInfo & { grant: Grant }
  getSessionInfo(sessionId: string, options?: { grant?: false }): SessionInfo
  getSessionInfo(
    sessionId: string,
    options: { grant?: boolean; grantId?: string } = {},
  ): SessionInfo | (SessionInfo & { grant: Grant }) {
    const info = this.getSession(sessionId)
    if (!options.grant) return info
    return { ...info, grant: this.getGrant(sessionId, options.grantId) }
  }

  /**
   * Replace the authentication event of a grant after the user
   * authenticated again
   */
  reauthenticate(sessionId: string, authnEvent: AuthenticationEvent, grantId?: string): void {
    this.getGrant(sessionId, grantId).reauthenticate(authnEvent)
  }

  /**
   * Remove a session together with all its grants and tokens
   */
  deleteSession(sessionId: string): void {
    const record = this.getRecord(sessionId)
    for (const grant of record.grants.values()) {
      for (const token of grant.tokens) {
        this.tokenIndex.delete(token.value)
      }
    }
    this.sessions.delete(sessionId)

    if (this.debug) {
      console.log('[OIDC] Session deleted:', sessionId)
    }
  }

  /**
   * Drop every session and token (teardown)
   */
  clear(): void {
    this.sessions.clear()
    this.tokenIndex.clear()
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Tokens
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Mint a token of the given kind under a session's grant
   */
  async mintToken(sessionId: string, kind: TokenKind, options: MintTokenOptions = {}): Promise<Token> {
    const grant = this.getGrant(sessionId, options.grantId)
    if (grant.revoked) {
      throw new OidcError(ErrorCode.InvalidGrant, 'Grant has been revoked')
    }

    const handler = this.tokenHandlers[kind]
    const issuedAt = this.clock()
    const expiresAt = options.expiresAt ?? issuedAt + handler.lifetime
    if (!Number.isFinite(expiresAt) || expiresAt <= issuedAt) {
      throw new ConfigurationError('Token expiry must be later than its issue time')
    }

    const basedOn = typeof options.basedOn === 'string' ? options.basedOn : options.basedOn?.value
    if (basedOn !== undefined && !grant.getToken(basedOn)) {
      throw new TokenNotFound()
    }

    const value = await handler.mint(sessionId, { expiresAt, basedOn })

    // The session may have been deleted while the value was being minted
    if (!this.sessions.has(sessionId)) {
      throw new SessionNotFound(sessionId)
    }

    const token = grant.issue({
      kind,
      id: generateToken(16),
      value,
      sessionId,
      grantId: grant.id,
      issuedAt,
      expiresAt,
      ...(basedOn !== undefined && { basedOn }),
    })
    this.tokenIndex.set(value, { sessionId, grantId: grant.id, token })

    if (this.debug) {
      console.log('[OIDC] Token minted:', { kind, sessionId, grantId: grant.id, value: tokenPrefix(value) })
    }

    return token
  }

  /**
   * Find the session, grant and token a bearer value belongs to
   */
  resolveToken(value: string): ResolvedToken {
    const entry = this.tokenIndex.get(value)
    if (!entry) throw new TokenNotFound()

    const record = this.sessions.get(entry.sessionId)
    const grant = record?.grants.get(entry.grantId)
    if (!record || !grant) throw new TokenNotFound()

    return { session: { ...record.info }, grant, token: entry.token }
  }

  /**
   * Decode a token value with the handler of its kind, without consulting
   * the registry
   */
  async decodeToken(value: string): Promise<TokenPayload | null> {
    for (const handler of Object.values(this.tokenHandlers)) {
      const payload = await handler.decode(value)
      if (payload) return payload
    }
    return null
  }

  /**
   * Whether a token is neither revoked nor expired
   */
  isTokenActive(token: Token, now: number = this.clock()): boolean {
    return !token.revoked && now < token.expiresAt
  }

  /**
   * Revoke a token. With `recursive`, every token derived from it is
   * revoked too. Returns the tokens whose state changed.
   */
  revokeToken(value: string, options: { recursive?: boolean } = {}): Token[] {
    const { grant } = this.resolveToken(value)
    const changed = grant.revokeToken(value, options.recursive)

    if (this.debug) {
      console.log('[OIDC] Token revoked:', { value: tokenPrefix(value), cascade: changed.length })
    }

    return changed
  }

  /**
   * Revoke a grant and every token minted under it
   */
  revokeGrant(sessionId: string, grantId?: string): void {
    const grant = this.getGrant(sessionId, grantId)
    grant.revoke()

    if (this.debug) {
      console.log('[OIDC] Grant revoked:', { sessionId, grantId: grant.id })
    }
  }

  /**
   * Exchange an authorization code exactly once.
   *
   * A second presentation of the same code revokes the code and everything
   * minted from it, then fails.
   */
  consumeAuthorizationCode(value: string): ResolvedToken {
    const resolved = this.resolveToken(value)
    const { token } = resolved

    if (token.kind !== 'authorization_code') {
      throw new WrongTokenKind('authorization_code', token.kind)
    }

    if (token.usedAt !== undefined) {
      this.revokeToken(value, { recursive: true })
      if (this.debug) {
        console.warn('[OIDC] Authorization code reused, derived tokens revoked:', tokenPrefix(value))
      }
      throw new TokenAlreadyUsed()
    }

    const now = this.clock()
    if (token.revoked) throw new ExpiredOrRevokedToken('revoked')
    if (now >= token.expiresAt) throw new ExpiredOrRevokedToken('expired')

    resolved.grant.markUsed(value, now)
    return resolved
  }
}
