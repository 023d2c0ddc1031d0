/**
 * Core OpenID Connect Provider Types
 *
 * Data structures shared by the token handlers, the session manager, the
 * claims interface and the UserInfo endpoint.
 *
 * No runtime dependencies.
 */

/**
 * Kinds of credential the provider issues
 */
export type TokenKind = 'authorization_code' | 'access_token' | 'refresh_token'

export const TOKEN_KINDS: readonly TokenKind[] = ['authorization_code', 'access_token', 'refresh_token']

/**
 * How the externally visible `sub` claim is derived for a session
 */
export type SubjectType = 'public' | 'pairwise' | 'ephemeral'

export const SUBJECT_TYPES: readonly SubjectType[] = ['public', 'pairwise', 'ephemeral']

/**
 * Purpose for which a claim set is resolved
 */
export type ClaimsUsage = 'userinfo' | 'id_token' | 'introspection'

export const CLAIMS_USAGES: readonly ClaimsUsage[] = ['userinfo', 'id_token', 'introspection']

/**
 * Claim values released about a user
 */
export type UserClaims = Record<string, unknown>

/**
 * One issued credential.
 *
 * Tokens are owned by their grant. `basedOn` holds the value of the token
 * this one was minted from and is only used for audit and cascading
 * revocation; it never extends trust.
 */
export interface Token {
  /** Token kind (discriminator) */
  readonly kind: TokenKind
  /** Unique token identifier */
  readonly id: string
  /** Opaque credential value handed to the client */
  readonly value: string
  /** Owning session */
  readonly sessionId: string
  /** Owning grant */
  readonly grantId: string
  /** When the token was issued (seconds since epoch) */
  readonly issuedAt: number
  /** When the token expires (seconds since epoch) */
  readonly expiresAt: number
  /** Value of the token this one was derived from */
  readonly basedOn?: string
  /** Revocation flag, only ever goes from false to true */
  readonly revoked: boolean
  /** When a single-use token was consumed; set once */
  readonly usedAt?: number | undefined
}

/**
 * Record of one user authentication
 */
export interface AuthenticationEvent {
  /** Authenticated user */
  readonly uid: string
  /** Authentication context class reference */
  readonly acr: string
  /** When the user authenticated (seconds since epoch) */
  readonly authnTime: number
  /** End of the freshness window (seconds since epoch) */
  readonly validUntil: number
  /** Free-form authentication method information */
  readonly authnInfo?: string
}

/**
 * Authorization request parameters that reach the core
 */
export interface AuthorizationRequest {
  client_id: string
  redirect_uri?: string
  scope: string[]
  response_type?: string
  state?: string
  nonce?: string
  sector_identifier_uri?: string
  [key: string]: unknown
}

/**
 * Registered client metadata the core reads
 */
export interface ClientMetadata {
  /** Client identifier */
  client_id: string
  /** Display name */
  client_name?: string
  /** Registered redirect URIs */
  redirect_uris?: string[]
  /** Sector identifier URI for pairwise subjects */
  sector_identifier_uri?: string
  /** Subject type requested at registration */
  subject_type?: SubjectType
  /** JWS algorithm for signed UserInfo responses */
  userinfo_signed_response_alg?: string
  [key: string]: unknown
}

/**
 * Session attributes returned by the session manager
 */
export interface SessionInfo {
  sessionId: string
  userId: string
  clientId: string
  subType: SubjectType
  sectorIdentifier?: string
  sub: string
  createdAt: number
}
