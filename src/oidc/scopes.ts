/**
 * Scope → claims mapping
 *
 * The standard table comes from OpenID Connect Core Section 5.4. Providers
 * add their own scopes (for example a research and scholarship profile) at
 * setup time through `addCustomScopes`; the claims interface consults the
 * registry and never hard-codes extension scopes.
 */

import { dedupe } from './helpers'

/**
 * Standard scope values and the claims they request
 */
export const STANDARD_SCOPE_CLAIMS: Readonly<Record<string, readonly string[]>> = {
  openid: ['sub'],
  profile: [
    'name',
    'given_name',
    'family_name',
    'middle_name',
    'nickname',
    'profile',
    'picture',
    'website',
    'gender',
    'birthdate',
    'zoneinfo',
    'locale',
    'updated_at',
    'preferred_username',
  ],
  email: ['email', 'email_verified'],
  address: ['address'],
  phone: ['phone_number', 'phone_number_verified'],
  offline_access: [],
}

export class ScopeRegistry {
  private readonly table = new Map<string, string[]>()

  constructor(customScopes: Record<string, string[]> = {}) {
    for (const [scope, claims] of Object.entries(STANDARD_SCOPE_CLAIMS)) {
      this.table.set(scope, [...claims])
    }
    this.addCustomScopes(customScopes)
  }

  /**
   * Install provider-specific scopes. A scope that already exists has its
   * claim list replaced.
   */
  addCustomScopes(customScopes: Record<string, string[]>): void {
    for (const [scope, claims] of Object.entries(customScopes)) {
      this.table.set(scope, dedupe(claims))
    }
  }

  has(scope: string): boolean {
    return this.table.has(scope)
  }

  /** Registered scope names, standard ones first */
  scopes(): string[] {
    return Array.from(this.table.keys())
  }

  /**
   * Claims requested by a list of scopes, in scope order, without
   * duplicates. Unknown scopes contribute nothing.
   */
  claimsForScopes(scopes: string[]): string[] {
    return dedupe(scopes.flatMap((scope) => this.table.get(scope) ?? []))
  }

  /** Every claim any registered scope can request */
  allClaims(): string[] {
    return dedupe(Array.from(this.table.values()).flat())
  }
}
