/**
 * Token Handlers
 *
 * One handler per token kind. A handler mints opaque, self-describing token
 * values and decodes them again without looking anything up:
 *
 *   <prefix>.<base64url(payload)>.<base64url(HMAC-SHA256(prefix.payload))>
 *
 * The payload carries the kind, the session id, a random `jti` and a
 * per-handler sequence number, so two values minted by one handler never
 * collide.
 */

import { ConfigurationError } from '../errors'
import type { TokenKind } from './types'
import { TOKEN_KINDS } from './types'
import {
  base64UrlDecodeString,
  base64UrlEncodeString,
  constantTimeEqual,
  generateToken,
  hmacSha256,
  importHmacKey,
} from './crypto'
import { isNumber, isObject, isString } from './guards'

/**
 * Data carried inside a token value
 */
export interface TokenPayload {
  kind: TokenKind
  /** Session the token was minted for */
  sid: string
  /** Random token identifier */
  jti: string
  /** Per-handler sequence number */
  seq: number
  /** Expiry (seconds since epoch) */
  exp: number
  /** Value of the parent token, when minted from one */
  based_on?: string
}

export interface MintOptions {
  /** Expiry (seconds since epoch) */
  expiresAt: number
  /** Value of the parent token */
  basedOn?: string | undefined
}

export interface TokenHandler {
  /** Kind of token this handler produces */
  readonly kind: TokenKind
  /** Default lifetime in seconds */
  readonly lifetime: number
  /** Mint a new token value */
  mint(sessionId: string, options: MintOptions): Promise<string>
  /** Decode and verify a value; null if it was not minted by this handler */
  decode(value: string): Promise<TokenPayload | null>
}

export interface TokenHandlerOptions {
  kind: TokenKind
  /** HMAC secret, at least 16 characters */
  key: string
  /** Default lifetime in seconds */
  lifetime: number
  /** Value prefix (default: derived from the kind) */
  prefix?: string
}

const MIN_KEY_LENGTH = 16

const DEFAULT_PREFIXES: Record<TokenKind, string> = {
  authorization_code: 'Z2FBQ',
  access_token: 'at',
  refresh_token: 'rt',
}

function isTokenPayload(data: unknown): data is TokenPayload {
  if (!isObject(data)) return false
  if (!TOKEN_KINDS.some((kind) => kind === data['kind'])) return false
  if (!isString(data['sid']) || !isString(data['jti'])) return false
  if (!isNumber(data['seq']) || !isNumber(data['exp'])) return false
  if (data['based_on'] !== undefined && !isString(data['based_on'])) return false
  return true
}

/**
 * HMAC-protected token handler
 */
export class DefaultTokenHandler implements TokenHandler {
  readonly kind: TokenKind
  readonly lifetime: number
  private readonly prefix: string
  private readonly secret: string
  private key: CryptoKey | undefined
  private seq = 0

  constructor(options: TokenHandlerOptions) {
    const { kind, key, lifetime, prefix = DEFAULT_PREFIXES[kind] } = options

    if (!key || key.length < MIN_KEY_LENGTH) {
      throw new ConfigurationError(`Token handler key for ${kind} must be at least ${MIN_KEY_LENGTH} characters`)
    }
    if (!Number.isFinite(lifetime) || lifetime <= 0) {
      throw new ConfigurationError(`Token handler lifetime for ${kind} must be a positive number of seconds`)
    }
    if (!prefix || prefix.includes('.')) {
      throw new ConfigurationError(`Token handler prefix for ${kind} must be non-empty and contain no '.'`)
    }

    this.kind = kind
    this.lifetime = lifetime
    this.prefix = prefix
    this.secret = key
  }

  private async getKey(): Promise<CryptoKey> {
    if (!this.key) {
      this.key = await importHmacKey(this.secret)
    }
    return this.key
  }

  async mint(sessionId: string, options: MintOptions): Promise<string> {
    this.seq += 1
    const payload: TokenPayload = {
      kind: this.kind,
      sid: sessionId,
      jti: generateToken(24),
      seq: this.seq,
      exp: options.expiresAt,
      ...(options.basedOn !== undefined && { based_on: options.basedOn }),
    }

    const body = `${this.prefix}.${base64UrlEncodeString(JSON.stringify(payload))}`
    const signature = await hmacSha256(await this.getKey(), body)
    return `${body}.${signature}`
  }

  async decode(value: string): Promise<TokenPayload | null> {
    const parts = value.split('.')
    if (parts.length !== 3) return null

    const [prefix, payloadB64, signature] = parts
    if (prefix !== this.prefix || !payloadB64 || !signature) return null

    const expected = await hmacSha256(await this.getKey(), `${prefix}.${payloadB64}`)
    if (!(await constantTimeEqual(expected, signature))) return null

    let payload: unknown
    try {
      payload = JSON.parse(base64UrlDecodeString(payloadB64))
    } catch {
      return null
    }

    if (!isTokenPayload(payload) || payload.kind !== this.kind) return null
    return payload
  }
}

/**
 * Build one handler per token kind from a shared key and per-kind lifetimes
 */
export function createTokenHandlers(key: string, lifetimes: Record<TokenKind, number>): Record<TokenKind, TokenHandler> {
  return {
    authorization_code: new DefaultTokenHandler({ kind: 'authorization_code', key, lifetime: lifetimes.authorization_code }),
    access_token: new DefaultTokenHandler({ kind: 'access_token', key, lifetime: lifetimes.access_token }),
    refresh_token: new DefaultTokenHandler({ kind: 'refresh_token', key, lifetime: lifetimes.refresh_token }),
  }
}
