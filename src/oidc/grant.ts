/**
 * Grant: one authorization transaction
 *
 * A grant holds the authentication event the user went through, the scopes
 * the client was given, every token minted under it, and the claim names
 * resolved per usage context.
 */

import type { AuthenticationEvent, AuthorizationRequest, ClaimsUsage, Token } from './types'
import { parseScope } from './helpers'

/**
 * Attributes of a token fixed when it is minted
 */
export type TokenInit = Omit<Token, 'revoked' | 'usedAt'>

/**
 * Registry record of a token. Holders see it through the read-only `Token`
 * shape; only the owning grant changes its state.
 */
class IssuedToken implements Token {
  readonly kind: Token['kind']
  readonly id: string
  readonly value: string
  readonly sessionId: string
  readonly grantId: string
  readonly issuedAt: number
  readonly expiresAt: number
  readonly basedOn?: string

  private revokedFlag = false
  private usedTime: number | undefined

  constructor(init: TokenInit) {
    this.kind = init.kind
    this.id = init.id
    this.value = init.value
    this.sessionId = init.sessionId
    this.grantId = init.grantId
    this.issuedAt = init.issuedAt
    this.expiresAt = init.expiresAt
    if (init.basedOn !== undefined) this.basedOn = init.basedOn
  }

  get revoked(): boolean {
    return this.revokedFlag
  }

  get usedAt(): number | undefined {
    return this.usedTime
  }

  /** Returns whether the state changed */
  revoke(): boolean {
    if (this.revokedFlag) return false
    this.revokedFlag = true
    return true
  }

  markUsed(at: number): void {
    if (this.usedTime === undefined) this.usedTime = at
  }
}

/**
 * Cached claim names for one usage, tagged with the inputs they were
 * computed from
 */
interface ClaimsCacheEntry {
  scopeKey: string
  addClaimsByScope: boolean
  claims: string[]
}

export interface GrantInit {
  id: string
  sub: string
  authenticationEvent: AuthenticationEvent
  authorizationRequest: AuthorizationRequest
  issuedAt: number
  scope?: string[] | undefined
}

export class Grant {
  readonly id: string
  readonly sub: string
  readonly authorizationRequest: AuthorizationRequest
  readonly issuedAt: number

  private revokedFlag = false
  private event: AuthenticationEvent
  private scopes: string[]
  private readonly issued: IssuedToken[] = []
  private readonly byValue = new Map<string, IssuedToken>()
  private readonly claimsCache = new Map<ClaimsUsage, ClaimsCacheEntry>()

  constructor(init: GrantInit) {
    this.id = init.id
    this.sub = init.sub
    this.event = init.authenticationEvent
    this.authorizationRequest = init.authorizationRequest
    this.issuedAt = init.issuedAt
    this.scopes = parseScope(init.scope ?? init.authorizationRequest.scope)
  }

  /** Revocation flag, only ever goes from false to true */
  get revoked(): boolean {
    return this.revokedFlag
  }

  get authenticationEvent(): AuthenticationEvent {
    return this.event
  }

  /** Authorized scopes */
  get scope(): string[] {
    return [...this.scopes]
  }

  /** Tokens in mint order */
  get tokens(): Token[] {
    return [...this.issued]
  }

  /**
   * Replace the authentication event after the user authenticated again
   */
  reauthenticate(event: AuthenticationEvent): void {
    this.event = event
  }

  /**
   * Change the authorized scopes; drops every cached claim set
   */
  setScope(scope: string[]): void {
    this.scopes = parseScope(scope)
    this.claimsCache.clear()
  }

  /**
   * Record a freshly minted token
   */
  issue(init: TokenInit): Token {
    const token = new IssuedToken(init)
    this.issued.push(token)
    this.byValue.set(token.value, token)
    return token
  }

  getToken(value: string): Token | undefined {
    return this.byValue.get(value)
  }

  /** Tokens minted from `value`, directly or through a chain of `basedOn` links */
  private descendants(value: string): IssuedToken[] {
    const result: IssuedToken[] = []
    const parents = new Set([value])
    for (const token of this.issued) {
      if (token.basedOn !== undefined && parents.has(token.basedOn)) {
        result.push(token)
        parents.add(token.value)
      }
    }
    return result
  }

  /**
   * Revoke a token of this grant, and with `recursive` every token derived
   * from it. Returns the tokens whose state changed.
   */
  revokeToken(value: string, recursive = false): Token[] {
    const token = this.byValue.get(value)
    if (!token) return []
    const targets = recursive ? [token, ...this.descendants(value)] : [token]
    return targets.filter((t) => t.revoke())
  }

  /**
   * Mark a single-use token as consumed; the first time sticks
   */
  markUsed(value: string, at: number): void {
    this.byValue.get(value)?.markUsed(at)
  }

  /**
   * Revoke the grant and every token minted under it
   */
  revoke(): void {
    this.revokedFlag = true
    for (const token of this.issued) {
      token.revoke()
    }
  }

  /**
   * Cached claim names for a usage, if they were computed from the same
   * scopes and policy flag
   */
  getCachedClaims(usage: ClaimsUsage, scopes: string[], addClaimsByScope: boolean): string[] | undefined {
    const entry = this.claimsCache.get(usage)
    if (!entry) return undefined
    if (entry.scopeKey !== scopes.join(' ') || entry.addClaimsByScope !== addClaimsByScope) return undefined
    return [...entry.claims]
  }

  setCachedClaims(usage: ClaimsUsage, scopes: string[], addClaimsByScope: boolean, claims: string[]): void {
    this.claimsCache.set(usage, { scopeKey: scopes.join(' '), addClaimsByScope, claims: [...claims] })
  }

  /** Whether the grant can still be used to release claims */
  isActive(): boolean {
    return !this.revokedFlag
  }
}
