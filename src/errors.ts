/**
 * Standardized Error Responses and Error Classes
 *
 * Every error that leaves the provider uses the OAuth 2.0 / OpenID Connect
 * wire shape (RFC 6749 Section 5.2, RFC 6750 Section 3.1):
 *
 *   {
 *     error: string              // Machine-readable error code (snake_case)
 *     error_description?: string // Human-readable description
 *     error_uri?: string         // Link to documentation
 *   }
 *
 * Inside the core, failures are thrown as subclasses of `OidcError`. Each
 * carries one of the `ErrorCode` values so that an endpoint can turn it into
 * the wire shape without inspecting the class.
 *
 * Usage:
 *   return errorJson(ErrorCode.ServerError, 'Signing failed', 500)
 */

// ============================================================================
// Error Codes: machine-readable, snake_case
// ============================================================================

export const ErrorCode = {
  // ── 400 Bad Request ────────────────────────────────────────────────────
  InvalidRequest: 'invalid_request',
  InvalidScope: 'invalid_scope',
  InvalidGrant: 'invalid_grant',

  // ── 401 Unauthorized ──────────────────────────────────────────────────
  InvalidToken: 'invalid_token',
  InvalidClient: 'invalid_client',

  // ── 403 Forbidden ─────────────────────────────────────────────────────
  InsufficientScope: 'insufficient_scope',
  AccessDenied: 'access_denied',

  // ── 404 Not Found ─────────────────────────────────────────────────────
  NotFound: 'not_found',

  // ── 500 Server Error ──────────────────────────────────────────────────
  ServerError: 'server_error',
  ConfigurationError: 'configuration_error',
} as const

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode]

// ============================================================================
// Error Response Interface (OAuth 2.0 compatible)
// ============================================================================

/**
 * Standard error response body.
 *
 * The `error` field is always present; `error_description` and `error_uri`
 * are optional.
 */
export interface ErrorResponse {
  /** Machine-readable error code (snake_case) */
  error: string
  /** Human-readable description of the error */
  error_description?: string
  /** URI to documentation about this error */
  error_uri?: string
}

// ============================================================================
// Error Response Helpers
// ============================================================================

/**
 * Create a standard error Response.
 *
 * @example
 * ```ts
 * return errorJson(ErrorCode.NotFound, 'Unknown client', 404)
 * ```
 */
export function errorJson(error: string, description?: string, status = 400): Response {
  const body: ErrorResponse = { error }
  if (description) body.error_description = description
  return Response.json(body, { status })
}

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base class for failures raised by the session, token and claims core.
 */
export class OidcError extends Error {
  constructor(
    public readonly code: ErrorCodeValue,
    message: string,
  ) {
    super(message)
    this.name = 'OidcError'
  }

  /** Wire representation of this error */
  toResponse(): ErrorResponse {
    return { error: this.code, error_description: this.message }
  }
}

export class SessionNotFound extends OidcError {
  constructor(public readonly sessionId: string) {
    super(ErrorCode.NotFound, `Unknown session: ${sessionId}`)
    this.name = 'SessionNotFound'
  }
}

export class GrantNotFound extends OidcError {
  constructor(
    public readonly sessionId: string,
    public readonly grantId?: string,
  ) {
    super(ErrorCode.NotFound, grantId ? `Unknown grant ${grantId} in session ${sessionId}` : `Session ${sessionId} has no grant`)
    this.name = 'GrantNotFound'
  }
}

export class TokenNotFound extends OidcError {
  constructor() {
    super(ErrorCode.InvalidToken, 'Invalid Token')
    this.name = 'TokenNotFound'
  }
}

export class WrongTokenKind extends OidcError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(ErrorCode.InvalidToken, 'Wrong type of token')
    this.name = 'WrongTokenKind'
  }
}

export class ExpiredOrRevokedToken extends OidcError {
  constructor(public readonly reason: 'expired' | 'revoked') {
    super(ErrorCode.InvalidToken, 'Invalid Token')
    this.name = 'ExpiredOrRevokedToken'
  }
}

export class StaleAuthentication extends OidcError {
  constructor(public readonly validUntil: number) {
    super(ErrorCode.InvalidRequest, 'Access not granted')
    this.name = 'StaleAuthentication'
  }
}

export class TokenAlreadyUsed extends OidcError {
  constructor() {
    super(ErrorCode.InvalidGrant, 'Authorization code has already been used')
    this.name = 'TokenAlreadyUsed'
  }
}

/**
 * Raised while setting things up: bad provider configuration, bad token
 * handler parameters, or a subject policy that cannot be satisfied.
 */
export class ConfigurationError extends OidcError {
  constructor(message: string) {
    super(ErrorCode.ConfigurationError, message)
    this.name = 'ConfigurationError'
  }
}
