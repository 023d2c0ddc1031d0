/**
 * Provider configuration
 *
 * `resolveProviderConfig` takes a plain object (typically parsed JSON),
 * checks every field it recognizes and fills in defaults. Anything it
 * cannot use is a `ConfigurationError`: the provider refuses to start
 * rather than run half-configured.
 */

import { ConfigurationError } from '../errors'
import type { ClaimsUsage, TokenKind } from './types'
import { CLAIMS_USAGES, TOKEN_KINDS } from './types'
import { isNumber, isObject, isScopeClaimsTable, isString, isStringArray } from './guards'
import { ScopeRegistry } from './scopes'
import { DEFAULT_AUTHN_EVENT_LIFETIME } from './authn-event'

export type BearerMethod = 'header' | 'body' | 'query'

export type UserInfoSigningAlg = 'RS256' | 'ES256'

export const SUPPORTED_SIGNING_ALGS: readonly UserInfoSigningAlg[] = ['RS256', 'ES256']

/**
 * Fully resolved provider configuration
 */
export interface ProviderConfig {
  /** Issuer identifier (URL, no trailing slash) */
  issuer: string
  /** HMAC key shared by the token handlers */
  tokenKey: string
  /** Salt mixed into subject identifiers */
  subjectSalt: string
  /** Default token lifetimes in seconds */
  tokenLifetimes: Record<TokenKind, number>
  /** Authentication freshness window in seconds */
  authnEventLifetime: number
  /** Claim names the provider advertises and will release */
  claimsSupported: string[]
  /** Release claims implied by requested scopes */
  addClaimsByScope: boolean
  /** Claims always released per usage, in addition to `sub` */
  baseClaims: Partial<Record<ClaimsUsage, string[]>>
  /** Provider-specific scope → claims table */
  extensionScopes: Record<string, string[]>
  /** Where the UserInfo endpoint looks for the bearer token */
  bearerMethods: BearerMethod[]
  /** Signing algorithms offered for UserInfo responses */
  userinfoSigningAlgValuesSupported: UserInfoSigningAlg[]
  /** Enable debug logging */
  debug: boolean
}

/**
 * Configuration as written by an operator; everything but `issuer` and
 * `tokenKey` is optional
 */
export type ProviderConfigInput = Partial<ProviderConfig> & Pick<ProviderConfig, 'issuer' | 'tokenKey'>

const DEFAULT_TOKEN_LIFETIMES: Record<TokenKind, number> = {
  authorization_code: 300,
  access_token: 3600,
  refresh_token: 86400,
}

const BEARER_METHODS: readonly BearerMethod[] = ['header', 'body', 'query']

function fail(field: string, expected: string): never {
  throw new ConfigurationError(`Invalid provider configuration: ${field} must be ${expected}`)
}

function optionalBoolean(raw: Record<string, unknown>, field: string, fallback: boolean): boolean {
  const value = raw[field]
  if (value === undefined) return fallback
  if (typeof value !== 'boolean') fail(field, 'a boolean')
  return value
}

function positiveSeconds(value: unknown, field: string): number {
  if (!isNumber(value) || value <= 0) fail(field, 'a positive number of seconds')
  return value
}

function parseLifetimes(value: unknown): Record<TokenKind, number> {
  if (value === undefined) return { ...DEFAULT_TOKEN_LIFETIMES }
  if (!isObject(value)) fail('tokenLifetimes', 'an object')

  const result = { ...DEFAULT_TOKEN_LIFETIMES }
  for (const kind of TOKEN_KINDS) {
    if (value[kind] !== undefined) {
      result[kind] = positiveSeconds(value[kind], `tokenLifetimes.${kind}`)
    }
  }
  return result
}

function parseBaseClaims(value: unknown): Partial<Record<ClaimsUsage, string[]>> {
  if (value === undefined) return {}
  if (!isObject(value)) fail('baseClaims', 'an object')

  const result: Partial<Record<ClaimsUsage, string[]>> = {}
  for (const [usage, claims] of Object.entries(value)) {
    const known = CLAIMS_USAGES.find((u) => u === usage)
    if (!known) fail(`baseClaims.${usage}`, `one of ${CLAIMS_USAGES.join(', ')}`)
    if (!isStringArray(claims)) fail(`baseClaims.${usage}`, 'a list of claim names')
    result[known] = claims
  }
  return result
}

function parseBearerMethods(value: unknown): BearerMethod[] {
  if (value === undefined) return ['header']
  if (!isStringArray(value) || value.length === 0) fail('bearerMethods', 'a non-empty list')

  return value.map((method) => {
    const known = BEARER_METHODS.find((m) => m === method)
    if (!known) fail('bearerMethods', `made of ${BEARER_METHODS.join(', ')}`)
    return known
  })
}

function parseSigningAlgs(value: unknown): UserInfoSigningAlg[] {
  if (value === undefined) return [...SUPPORTED_SIGNING_ALGS]
  if (!isStringArray(value)) fail('userinfoSigningAlgValuesSupported', 'a list of algorithms')

  return value.map((alg) => {
    const known = SUPPORTED_SIGNING_ALGS.find((a) => a === alg)
    if (!known) fail('userinfoSigningAlgValuesSupported', `made of ${SUPPORTED_SIGNING_ALGS.join(', ')}`)
    return known
  })
}

/**
 * Validate raw configuration and apply defaults
 *
 * @example
 * ```typescript
 * const config = resolveProviderConfig(JSON.parse(readFileSync('provider.json', 'utf8')))
 * ```
 */
export function resolveProviderConfig(input: unknown): ProviderConfig {
  if (!isObject(input)) {
    throw new ConfigurationError('Invalid provider configuration: expected an object')
  }

  const issuer = input['issuer']
  if (!isString(issuer)) fail('issuer', 'a URL')
  try {
    new URL(issuer)
  } catch {
    fail('issuer', 'a URL')
  }

  const tokenKey = input['tokenKey']
  if (!isString(tokenKey) || tokenKey.length < 16) fail('tokenKey', 'a string of at least 16 characters')

  const subjectSalt = input['subjectSalt'] ?? 'salt'
  if (!isString(subjectSalt)) fail('subjectSalt', 'a string')

  const extensionScopes = input['extensionScopes'] ?? {}
  if (!isScopeClaimsTable(extensionScopes)) fail('extensionScopes', 'a table of scope → claim names')

  const claimsSupportedInput = input['claimsSupported']
  let claimsSupported: string[]
  if (claimsSupportedInput === undefined) {
    claimsSupported = new ScopeRegistry(extensionScopes).allClaims()
  } else if (isStringArray(claimsSupportedInput)) {
    claimsSupported = claimsSupportedInput
  } else {
    fail('claimsSupported', 'a list of claim names')
  }

  const authnEventLifetime =
    input['authnEventLifetime'] === undefined
      ? DEFAULT_AUTHN_EVENT_LIFETIME
      : positiveSeconds(input['authnEventLifetime'], 'authnEventLifetime')

  const debug = optionalBoolean(input, 'debug', false)
  const config: ProviderConfig = {
    issuer: issuer.replace(/\/$/, ''),
    tokenKey,
    subjectSalt,
    tokenLifetimes: parseLifetimes(input['tokenLifetimes']),
    authnEventLifetime,
    claimsSupported,
    addClaimsByScope: optionalBoolean(input, 'addClaimsByScope', false),
    baseClaims: parseBaseClaims(input['baseClaims']),
    extensionScopes,
    bearerMethods: parseBearerMethods(input['bearerMethods']),
    userinfoSigningAlgValuesSupported: parseSigningAlgs(input['userinfoSigningAlgValuesSupported']),
    debug,
  }

  if (debug) {
    const advertised = new Set(config.claimsSupported)
    for (const [scope, claims] of Object.entries(extensionScopes)) {
      const hidden = claims.filter((claim) => !advertised.has(claim))
      if (hidden.length > 0) {
        console.warn(`[OIDC] Scope ${scope} names claims that are not advertised:`, hidden)
      }
    }
  }

  return config
}
