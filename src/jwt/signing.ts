/**
 * JWS Signing Key Management
 *
 * Manages RS256 (RSA-2048) and ES256 (ECDSA P-256) signing keys and produces
 * compact JWS serializations with the Web Crypto API. Keys live in memory;
 * they can be seeded from serialized JWKs so that a deployment keeps its
 * key ids across restarts.
 */

import { base64UrlEncode, base64UrlEncodeString } from '../oidc/crypto'

// ============================================================================
// Types
// ============================================================================

export type SigningAlg = 'RS256' | 'ES256'

export interface SigningKey {
  kid: string
  alg: SigningAlg
  privateKey: CryptoKey
  publicKey: CryptoKey
  createdAt: number
}

export interface RSAPublicJWK {
  kty: 'RSA'
  kid: string
  use: 'sig'
  alg: 'RS256'
  n: string
  e: string
}

export interface ECPublicJWK {
  kty: 'EC'
  kid: string
  use: 'sig'
  alg: 'ES256'
  crv: 'P-256'
  x: string
  y: string
}

export type JWKSPublicKey = RSAPublicJWK | ECPublicJWK

export interface JWKS {
  keys: JWKSPublicKey[]
}

export interface SerializedSigningKey {
  kid: string
  alg: SigningAlg
  privateKeyJwk: JsonWebKey
  publicKeyJwk: JsonWebKey
  createdAt: number
}

export interface JWSOptions {
  /** Signing algorithm */
  alg: SigningAlg
  /** `iss` claim */
  issuer: string
  /** `aud` claim */
  audience?: string | undefined
  /** Adds `exp` = iat + expiresIn when set */
  expiresIn?: number | undefined
}

/**
 * Anything that can turn a claim set into a compact JWS
 */
export interface JwsSigner {
  sign(claims: Record<string, unknown>, options: JWSOptions): Promise<string>
}

// ============================================================================
// Algorithm Parameters
// ============================================================================

const KEY_PARAMS = {
  RS256: {
    generate: {
      name: 'RSASSA-PKCS1-v1_5',
      modulusLength: 2048,
      publicExponent: new Uint8Array([1, 0, 1]),
      hash: 'SHA-256',
    } satisfies RsaHashedKeyGenParams,
    import: { name: 'RSASSA-PKCS1-v1_5', hash: 'SHA-256' } satisfies RsaHashedImportParams,
    sign: { name: 'RSASSA-PKCS1-v1_5' } satisfies AlgorithmIdentifier,
  },
  ES256: {
    generate: { name: 'ECDSA', namedCurve: 'P-256' } satisfies EcKeyGenParams,
    import: { name: 'ECDSA', namedCurve: 'P-256' } satisfies EcKeyImportParams,
    sign: { name: 'ECDSA', hash: 'SHA-256' } satisfies EcdsaParams,
  },
} as const

export function isSigningAlg(value: unknown): value is SigningAlg {
  return value === 'RS256' || value === 'ES256'
}

// ============================================================================
// Key Generation & Serialization
// ============================================================================

export async function generateSigningKey(alg: SigningAlg = 'RS256', kid?: string): Promise<SigningKey> {
  const keyPair = await crypto.subtle.generateKey(KEY_PARAMS[alg].generate, true, ['sign', 'verify'])

  if (!kid) {
    const jwk = await crypto.subtle.exportKey('jwk', keyPair.publicKey)
    // RFC 7638 thumbprint members, in lexicographic order
    const thumbprintInput =
      alg === 'RS256'
        ? JSON.stringify({ e: jwk.e, kty: jwk.kty, n: jwk.n })
        : JSON.stringify({ crv: jwk.crv, kty: jwk.kty, x: jwk.x, y: jwk.y })
    const hash = await crypto.subtle.digest('SHA-256', new TextEncoder().encode(thumbprintInput))
    kid = base64UrlEncode(hash).slice(0, 16)
  }

  return {
    kid,
    alg,
    privateKey: keyPair.privateKey,
    publicKey: keyPair.publicKey,
    createdAt: Date.now(),
  }
}

export async function serializeSigningKey(key: SigningKey): Promise<SerializedSigningKey> {
  const [privateKeyJwk, publicKeyJwk] = await Promise.all([
    crypto.subtle.exportKey('jwk', key.privateKey),
    crypto.subtle.exportKey('jwk', key.publicKey),
  ])

  return {
    kid: key.kid,
    alg: key.alg,
    privateKeyJwk,
    publicKeyJwk,
    createdAt: key.createdAt,
  }
}

export async function deserializeSigningKey(serialized: SerializedSigningKey): Promise<SigningKey> {
  const params = KEY_PARAMS[serialized.alg].import
  const [privateKey, publicKey] = await Promise.all([
    crypto.subtle.importKey('jwk', serialized.privateKeyJwk, params, true, ['sign']),
    crypto.subtle.importKey('jwk', serialized.publicKeyJwk, params, true, ['verify']),
  ])

  return {
    kid: serialized.kid,
    alg: serialized.alg,
    privateKey,
    publicKey,
    createdAt: serialized.createdAt,
  }
}

export async function exportPublicKeyToJWKS(key: SigningKey): Promise<JWKSPublicKey> {
  const jwk = await crypto.subtle.exportKey('jwk', key.publicKey)

  if (key.alg === 'RS256') {
    if (!jwk.n || !jwk.e) throw new Error(`Signing key ${key.kid} is missing RSA parameters`)
    return { kty: 'RSA', kid: key.kid, use: 'sig', alg: 'RS256', n: jwk.n, e: jwk.e }
  }

  if (!jwk.x || !jwk.y) throw new Error(`Signing key ${key.kid} is missing EC parameters`)
  return { kty: 'EC', kid: key.kid, use: 'sig', alg: 'ES256', crv: 'P-256', x: jwk.x, y: jwk.y }
}

export async function exportKeysToJWKS(keys: SigningKey[]): Promise<JWKS> {
  const publicKeys = await Promise.all(keys.map(exportPublicKeyToJWKS))
  return { keys: publicKeys }
}

// ============================================================================
// JWS Signing
// ============================================================================

/**
 * Sign a claim set with a key, adding `iss`, `aud` and `iat`
 * (and `exp` when `expiresIn` is given)
 */
export async function signJWT(
  key: SigningKey,
  claims: Record<string, unknown>,
  options: Omit<JWSOptions, 'alg'>,
): Promise<string> {
  const { issuer, audience, expiresIn } = options
  const now = Math.floor(Date.now() / 1000)

  const header = { alg: key.alg, typ: 'JWT' as const, kid: key.kid }
  const payload = {
    ...claims,
    iss: issuer,
    ...(audience !== undefined && { aud: audience }),
    iat: now,
    ...(expiresIn !== undefined && { exp: now + expiresIn }),
  }

  const data = `${base64UrlEncodeString(JSON.stringify(header))}.${base64UrlEncodeString(JSON.stringify(payload))}`
  const signature = await crypto.subtle.sign(KEY_PARAMS[key.alg].sign, key.privateKey, new TextEncoder().encode(data))

  return `${data}.${base64UrlEncode(signature)}`
}

// ============================================================================
// SigningKeyManager: in-memory key ring, one current key per algorithm
// ============================================================================

/**
 * Holds signing keys and signs on behalf of the provider.
 *
 * Usage:
 *   const manager = new SigningKeyManager()
 *   const jwks = await manager.getJWKS()
 *   const jws = await manager.sign(claims, { alg: 'ES256', issuer: 'https://op.example.com' })
 */
export class SigningKeyManager implements JwsSigner {
  private keys: SigningKey[] = []
  private loading: Promise<void> | undefined

  constructor(
    private readonly algorithms: SigningAlg[] = ['RS256', 'ES256'],
    private readonly seed: SerializedSigningKey[] = [],
  ) {}

  private async ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load()
    }
    return this.loading
  }

  private async load(): Promise<void> {
    const seeded = await Promise.all(this.seed.map(deserializeSigningKey))
    const missing = this.algorithms.filter((alg) => !seeded.some((key) => key.alg === alg))
    const generated = await Promise.all(missing.map((alg) => generateSigningKey(alg)))
    this.keys = [...seeded, ...generated]
  }

  /** Newest key for an algorithm */
  async getCurrentKey(alg: SigningAlg): Promise<SigningKey> {
    await this.ensureLoaded()
    const candidates = this.keys.filter((key) => key.alg === alg)
    const key = candidates[candidates.length - 1]
    if (!key) throw new Error(`No signing key for algorithm ${alg}`)
    return key
  }

  /** Every key, as stored */
  async getKeys(): Promise<SigningKey[]> {
    await this.ensureLoaded()
    return [...this.keys]
  }

  async getJWKS(): Promise<JWKS> {
    await this.ensureLoaded()
    return exportKeysToJWKS(this.keys)
  }

  async sign(claims: Record<string, unknown>, options: JWSOptions): Promise<string> {
    const key = await this.getCurrentKey(options.alg)
    return signJWT(key, claims, options)
  }

  async rotateKey(alg: SigningAlg): Promise<SigningKey> {
    await this.ensureLoaded()
    const newKey = await generateSigningKey(alg)
    this.keys.push(newKey)

    // Keep the current and the previous key per algorithm
    const forAlg = this.keys.filter((key) => key.alg === alg)
    const retired = new Set(forAlg.slice(0, Math.max(0, forAlg.length - 2)))
    this.keys = this.keys.filter((key) => !retired.has(key))

    return newKey
  }
}
