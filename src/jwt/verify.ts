/**
 * JWS Verification
 *
 * Checks compact JWS values produced by the signing key manager (or any
 * RS256 / ES256 signer) against a known public key, then validates the
 * standard claims (exp, nbf, iat, iss, aud).
 */

import { base64UrlDecode, base64UrlDecodeString } from '../oidc/crypto'
import { isNumber, isObject, isString, isStringArray } from '../oidc/guards'
import type { SigningAlg } from './signing'
import { isSigningAlg } from './signing'

// ═══════════════════════════════════════════════════════════════════════════
// Public Types
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Result of JWT verification - discriminated union based on validity
 */
export type JWTVerifyResult =
  | { valid: true; payload: JWTPayload; header: JWTHeader; error?: undefined }
  | { valid: false; error: string; payload?: JWTPayload | undefined; header?: JWTHeader | undefined }

export interface JWTHeader {
  /** Algorithm used for signing */
  alg: string
  /** Token type (typically 'JWT') */
  typ?: string
  /** Key ID */
  kid?: string
}

export interface JWTPayload {
  iss?: string
  sub?: string
  aud?: string | string[]
  exp?: number
  nbf?: number
  iat?: number
  jti?: string
  [key: string]: unknown
}

export interface JWTVerifyOptions {
  /** Key to check the signature with */
  publicKey: CryptoKey
  /** Expected issuer */
  issuer?: string
  /** Expected audience (any of) */
  audience?: string | string[]
  /** Clock tolerance in seconds for exp/nbf/iat checks (default: 60) */
  clockTolerance?: number
  /** Time source in seconds (default: wall clock) */
  now?: number
}

// ═══════════════════════════════════════════════════════════════════════════
// Guards
// ═══════════════════════════════════════════════════════════════════════════

function isJWTHeader(data: unknown): data is JWTHeader {
  if (!isObject(data)) return false
  if (!isString(data['alg'])) return false
  if (data['typ'] !== undefined && !isString(data['typ'])) return false
  if (data['kid'] !== undefined && !isString(data['kid'])) return false
  return true
}

function isJWTPayload(data: unknown): data is JWTPayload {
  if (!isObject(data)) return false
  if (data['iss'] !== undefined && !isString(data['iss'])) return false
  if (data['sub'] !== undefined && !isString(data['sub'])) return false
  for (const field of ['exp', 'nbf', 'iat']) {
    if (data[field] !== undefined && !isNumber(data[field])) return false
  }
  if (data['aud'] !== undefined && !isString(data['aud']) && !isStringArray(data['aud'])) return false
  return true
}

// ═══════════════════════════════════════════════════════════════════════════
// Decoding & Verification
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Decode a JWT without verifying the signature
 *
 * @returns Decoded header and payload, or null if the value is malformed
 */
export function decodeJWT(token: string): { header: JWTHeader; payload: JWTPayload } | null {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split('.')
  if (!headerB64 || !payloadB64 || signatureB64 === undefined || rest.length > 0) return null

  try {
    const header: unknown = JSON.parse(base64UrlDecodeString(headerB64))
    const payload: unknown = JSON.parse(base64UrlDecodeString(payloadB64))
    if (!isJWTHeader(header) || !isJWTPayload(payload)) return null
    return { header, payload }
  } catch {
    return null
  }
}

const VERIFY_PARAMS = {
  RS256: { name: 'RSASSA-PKCS1-v1_5' },
  ES256: { name: 'ECDSA', hash: 'SHA-256' },
} as const satisfies Record<SigningAlg, AlgorithmIdentifier | EcdsaParams>

/**
 * Verify a compact JWS and its standard claims
 *
 * @example
 * ```typescript
 * const key = await manager.getCurrentKey('ES256')
 * const result = await verifyJWT(jws, { publicKey: key.publicKey, issuer: 'https://op.example.com' })
 * if (result.valid) console.log(result.payload.sub)
 * ```
 */
export async function verifyJWT(token: string, options: JWTVerifyOptions): Promise<JWTVerifyResult> {
  const { publicKey, issuer, audience, clockTolerance = 60 } = options

  const decoded = decodeJWT(token)
  if (!decoded) {
    return { valid: false, error: 'Invalid JWT format' }
  }
  const { header, payload } = decoded

  if (!isSigningAlg(header.alg)) {
    return { valid: false, error: `Unsupported algorithm: ${header.alg}`, header, payload }
  }

  const lastDot = token.lastIndexOf('.')
  let signatureValid: boolean
  try {
    signatureValid = await crypto.subtle.verify(
      VERIFY_PARAMS[header.alg],
      publicKey,
      base64UrlDecode(token.slice(lastDot + 1)),
      new TextEncoder().encode(token.slice(0, lastDot)),
    )
  } catch (err) {
    return { valid: false, error: err instanceof Error ? err.message : 'Signature check failed', header, payload }
  }
  if (!signatureValid) {
    return { valid: false, error: 'Invalid signature', header, payload }
  }

  const now = options.now ?? Math.floor(Date.now() / 1000)

  if (payload.exp !== undefined && now > payload.exp + clockTolerance) {
    return { valid: false, error: 'Token has expired', header, payload }
  }
  if (payload.nbf !== undefined && now < payload.nbf - clockTolerance) {
    return { valid: false, error: 'Token not yet valid (nbf)', header, payload }
  }
  if (payload.iat !== undefined && payload.iat > now + clockTolerance) {
    return { valid: false, error: 'Token issued in the future (iat)', header, payload }
  }

  if (issuer !== undefined && payload.iss !== issuer) {
    return { valid: false, error: `Invalid issuer: expected ${issuer}, got ${payload.iss}`, header, payload }
  }

  if (audience !== undefined) {
    const tokenAud = Array.isArray(payload.aud) ? payload.aud : payload.aud ? [payload.aud] : []
    const expectedAud = Array.isArray(audience) ? audience : [audience]
    if (!expectedAud.some((aud) => tokenAud.includes(aud))) {
      return {
        valid: false,
        error: `Invalid audience: expected one of ${expectedAud.join(', ')}, got ${tokenAud.join(', ')}`,
        header,
        payload,
      }
    }
  }

  return { valid: true, payload, header }
}
