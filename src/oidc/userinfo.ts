/**
 * UserInfo endpoint (OpenID Connect Core Section 5.3)
 *
 * Three steps, each usable on its own:
 *
 *   parseRequest   → find the bearer credential and its client; never throws
 *   processRequest → check the credential and resolve the claims; no mutation
 *   doResponse     → encode the result as JSON or as a signed JWT
 *
 * Failures of the session and token core are turned into
 * `{ error, error_description }` values here and never leave as exceptions.
 */

import { ErrorCode, ExpiredOrRevokedToken, OidcError, StaleAuthentication, WrongTokenKind } from '../errors'
import type { ErrorCodeValue } from '../errors'
import type { JwsSigner } from '../jwt/signing'
import { isSigningAlg } from '../jwt/signing'
import type { UserClaims } from './types'
import type { SessionManager } from './session-manager'
import type { ClaimsInterface } from './claims'
import type { ClientStore } from './storage'
import type { BearerMethod, UserInfoSigningAlg } from './config'
import { isAuthnEventValid } from './authn-event'
import { isString } from './guards'
import { tokenPrefix } from './helpers'

// ═══════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Transport details of an incoming request
 */
export interface HttpInfo {
  headers?: Record<string, string | undefined>
  query?: Record<string, string | undefined>
  /** Decoded form body, when the request carried one */
  body?: Record<string, unknown>
}

export interface UserInfoErrorArgs {
  error: ErrorCodeValue
  error_description: string
}

/**
 * Outcome of `parseRequest`
 */
export type UserInfoRequest =
  | { client_id: string; access_token: string; error?: undefined }
  | (UserInfoErrorArgs & { client_id?: undefined; access_token?: string | undefined })

/**
 * Outcome of `processRequest`
 */
export type UserInfoProcessResult =
  | { ok: true; responseArgs: UserClaims; clientId: string; sessionId: string }
  | { ok: false; responseArgs: UserInfoErrorArgs }

export interface UserInfoResponse {
  status: number
  headers: Record<string, string>
  /** JSON text or a compact JWS */
  body: string
  format: 'json' | 'jwt'
}

export interface UserInfoEndpointConfig {
  sessionManager: SessionManager
  claimsInterface: ClaimsInterface
  clients: ClientStore
  signer: JwsSigner
  /** `iss` of signed responses and realm of bearer challenges */
  issuer: string
  /** Where to look for the bearer token (default: header only) */
  bearerMethods?: BearerMethod[] | undefined
  /** Algorithms a client may ask for (default: RS256, ES256) */
  signingAlgs?: UserInfoSigningAlg[] | undefined
  /** Enable debug logging */
  debug?: boolean | undefined
}

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i

function failure(error: ErrorCodeValue, description: string): { ok: false; responseArgs: UserInfoErrorArgs } {
  return { ok: false, responseArgs: { error, error_description: description } }
}

// ═══════════════════════════════════════════════════════════════════════════
// Endpoint
// ═══════════════════════════════════════════════════════════════════════════

export class UserInfoEndpoint {
  private readonly sessionManager: SessionManager
  private readonly claimsInterface: ClaimsInterface
  private readonly clients: ClientStore
  private readonly signer: JwsSigner
  private readonly issuer: string
  private readonly bearerMethods: BearerMethod[]
  private readonly signingAlgs: UserInfoSigningAlg[]
  private readonly debug: boolean

  constructor(config: UserInfoEndpointConfig) {
    const {
      sessionManager,
      claimsInterface,
      clients,
      signer,
      issuer,
      bearerMethods = ['header'],
      signingAlgs = ['RS256', 'ES256'],
      debug = false,
    } = config
    this.sessionManager = sessionManager
    this.claimsInterface = claimsInterface
    this.clients = clients
    this.signer = signer
    this.issuer = issuer
    this.bearerMethods = bearerMethods
    this.signingAlgs = signingAlgs
    this.debug = debug
  }

  /**
   * Bearer credential carried by a request, looked up in the enabled
   * places in order: Authorization header, form body, query string
   */
  extractBearer(request: Record<string, unknown>, httpInfo: HttpInfo = {}): string | undefined {
    if (this.bearerMethods.includes('header')) {
      for (const [name, value] of Object.entries(httpInfo.headers ?? {})) {
        if (name.toLowerCase() !== 'authorization' || value === undefined) continue
        const match = BEARER_PATTERN.exec(value)
        if (match?.[1]) return match[1]
      }
    }
    if (this.bearerMethods.includes('body')) {
      const value = request['access_token']
      if (isString(value) && value) return value
    }
    if (this.bearerMethods.includes('query')) {
      const value = httpInfo.query?.['access_token']
      if (value) return value
    }
    return undefined
  }

  /**
   * Find the bearer credential and the client it was issued to.
   * An unknown credential is reported in the result, not thrown.
   */
  parseRequest(request: Record<string, unknown>, httpInfo: HttpInfo = {}): UserInfoRequest {
    const accessToken = this.extractBearer(request, httpInfo)
    if (accessToken === undefined) {
      return { error: ErrorCode.InvalidRequest, error_description: 'Missing access token' }
    }

    try {
      const { session } = this.sessionManager.resolveToken(accessToken)
      return { client_id: session.clientId, access_token: accessToken }
    } catch (err) {
      if (!(err instanceof OidcError)) throw err
      if (this.debug) {
        console.log('[OIDC] UserInfo bearer not recognized:', { value: tokenPrefix(accessToken), reason: err.name })
      }
      return { error: ErrorCode.InvalidToken, error_description: 'Invalid Token', access_token: accessToken }
    }
  }

  /**
   * Check the credential and resolve the claims to release.
   *
   * When `httpInfo` is given, the bearer it carries must be the one the
   * request was parsed from.
   */
  async processRequest(request: UserInfoRequest, httpInfo?: HttpInfo): Promise<UserInfoProcessResult> {
    if (request.error !== undefined) {
      return failure(request.error, request.error_description)
    }

    if (httpInfo !== undefined && this.extractBearer(httpInfo.body ?? {}, httpInfo) !== request.access_token) {
      return failure(ErrorCode.InvalidToken, 'Invalid Token')
    }

    try {
      const { session, grant, token } = this.sessionManager.resolveToken(request.access_token)

      if (token.kind !== 'access_token') {
        throw new WrongTokenKind('access_token', token.kind)
      }

      const now = this.sessionManager.now()
      if (token.revoked || grant.revoked) {
        throw new ExpiredOrRevokedToken('revoked')
      }
      if (!this.sessionManager.isTokenActive(token, now)) {
        throw new ExpiredOrRevokedToken('expired')
      }

      const event = grant.authenticationEvent
      if (!isAuthnEventValid(event, now)) {
        throw new StaleAuthentication(event.validUntil)
      }

      const claims = await this.claimsInterface.getUserInfoClaims(session.sessionId, grant.id)
      return { ok: true, responseArgs: claims, clientId: session.clientId, sessionId: session.sessionId }
    } catch (err) {
      if (!(err instanceof OidcError)) throw err
      if (this.debug) {
        console.log('[OIDC] UserInfo request rejected:', {
          value: tokenPrefix(request.access_token),
          reason: err.name,
        })
      }
      return failure(err.code, err.message)
    }
  }

  /**
   * Encode a processed request. Clients registered with
   * `userinfo_signed_response_alg` get a signed JWT carrying the same claims.
   */
  async doResponse(request: UserInfoRequest, result: UserInfoProcessResult): Promise<UserInfoResponse> {
    if (!result.ok) {
      return this.errorResponse(request, result.responseArgs)
    }

    const client = await this.clients.getClient(result.clientId)
    const alg = client?.userinfo_signed_response_alg

    if (alg === undefined) {
      return {
        status: 200,
        headers: { 'Content-Type': 'application/json', 'Cache-Control': 'no-store' },
        body: JSON.stringify(result.responseArgs),
        format: 'json',
      }
    }

    if (!isSigningAlg(alg) || !this.signingAlgs.includes(alg)) {
      if (this.debug) {
        console.warn('[OIDC] Client asked for an unsupported UserInfo signing algorithm:', {
          clientId: result.clientId,
          alg,
        })
      }
      return this.errorResponse(request, {
        error: ErrorCode.ServerError,
        error_description: `Unsupported signing algorithm: ${alg}`,
      })
    }

    const jws = await this.signer.sign(result.responseArgs, { alg, issuer: this.issuer, audience: result.clientId })
    return {
      status: 200,
      headers: { 'Content-Type': 'application/jwt', 'Cache-Control': 'no-store' },
      body: jws,
      format: 'jwt',
    }
  }

  private errorResponse(request: UserInfoRequest, args: UserInfoErrorArgs): UserInfoResponse {
    const headers: Record<string, string> = { 'Content-Type': 'application/json', 'Cache-Control': 'no-store' }
    let status: number

    if (args.error === ErrorCode.ServerError) {
      status = 500
    } else if (request.access_token === undefined) {
      // RFC 6750 Section 3.1: no credential at all gets a bare challenge
      status = 401
      headers['WWW-Authenticate'] = `Bearer realm="${this.issuer}"`
    } else {
      status = args.error === ErrorCode.InvalidRequest ? 400 : 401
      headers['WWW-Authenticate'] = `Bearer realm="${this.issuer}", error="${args.error}"`
    }

    return { status, headers, body: JSON.stringify(args), format: 'json' }
  }
}
