/**
 * Claims Interface
 *
 * Works out which claims may be released for a session and usage, and
 * fetches their values from the user attribute store.
 *
 * Resolution for one usage:
 *   1. `sub` plus the statically configured claims for the usage
 *   2. if `addClaimsByScope` is on, the claims of every requested scope,
 *      standard or provider-registered
 *   3. keep only names listed in `claimsSupported`
 *   4. drop duplicates, first occurrence wins
 */

import type { ClaimsUsage, UserClaims } from './types'
import type { SessionManager } from './session-manager'
import type { UserInfoStore } from './storage'
import type { ScopeRegistry } from './scopes'
import { dedupe, parseScope } from './helpers'

export interface ClaimsInterfaceConfig {
  sessionManager: SessionManager
  users: UserInfoStore
  scopes: ScopeRegistry
  /** Advertised claim names */
  claimsSupported: string[]
  /** Release claims implied by requested scopes */
  addClaimsByScope?: boolean | undefined
  /** Claims always released per usage, in addition to `sub` */
  baseClaims?: Partial<Record<ClaimsUsage, string[]>> | undefined
  /** Enable debug logging */
  debug?: boolean | undefined
}

export class ClaimsInterface {
  private readonly sessionManager: SessionManager
  private readonly users: UserInfoStore
  private readonly scopes: ScopeRegistry
  private readonly claimsSupported: Set<string>
  private readonly baseClaims: Partial<Record<ClaimsUsage, string[]>>
  private readonly debug: boolean
  private byScope: boolean

  constructor(config: ClaimsInterfaceConfig) {
    const { sessionManager, users, scopes, claimsSupported, addClaimsByScope = false, baseClaims = {}, debug = false } = config
    this.sessionManager = sessionManager
    this.users = users
    this.scopes = scopes
    this.claimsSupported = new Set(claimsSupported)
    this.baseClaims = baseClaims
    this.byScope = addClaimsByScope
    this.debug = debug
  }

  get addClaimsByScope(): boolean {
    return this.byScope
  }

  /**
   * Turn scope-based claim release on or off. Cached claim sets computed
   * under the other setting are not reused.
   */
  setAddClaimsByScope(enabled: boolean): void {
    this.byScope = enabled
  }

  /**
   * Claim names releasable for a session, scopes and usage
   */
  getClaims(sessionId: string, scopes: string[], usage: ClaimsUsage): string[] {
    // Unknown sessions fail here rather than silently resolving
    this.sessionManager.getSession(sessionId)

    const candidates = ['sub', ...(this.baseClaims[usage] ?? [])]
    if (this.byScope) {
      candidates.push(...this.scopes.claimsForScopes(parseScope(scopes)))
    }

    const released = dedupe(candidates.filter((claim) => this.claimsSupported.has(claim)))

    if (this.debug) {
      const dropped = dedupe(candidates.filter((claim) => !this.claimsSupported.has(claim)))
      if (dropped.length > 0) {
        console.log('[OIDC] Unsupported claims dropped:', { usage, dropped })
      }
    }

    return released
  }

  /**
   * Claim names for a grant's authorized scopes, cached on the grant
   */
  getGrantClaims(sessionId: string, usage: ClaimsUsage, grantId?: string): string[] {
    const grant = this.sessionManager.getGrant(sessionId, grantId)
    const scopes = grant.scope

    const cached = grant.getCachedClaims(usage, scopes, this.byScope)
    if (cached) return cached

    const claims = this.getClaims(sessionId, scopes, usage)
    grant.setCachedClaims(usage, scopes, this.byScope, claims)
    return claims
  }

  /**
   * Values of the named claims for a user. An unknown user gives `{}`.
   */
  async getUserClaims(userId: string, claimNames: string[]): Promise<UserClaims> {
    if (claimNames.length === 0) return {}
    return this.users.getUserClaims(userId, claimNames)
  }

  /**
   * Claims released at the UserInfo endpoint for a session's grant:
   * the grant's `sub` followed by the user's values
   */
  async getUserInfoClaims(sessionId: string, grantId?: string): Promise<UserClaims> {
    const session = this.sessionManager.getSession(sessionId)
    const grant = this.sessionManager.getGrant(sessionId, grantId)
    const names = this.getGrantClaims(sessionId, 'userinfo', grant.id).filter((claim) => claim !== 'sub')
    const values = await this.getUserClaims(session.userId, names)
    return { sub: grant.sub, ...values }
  }
}
