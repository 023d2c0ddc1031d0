/**
 * Crypto utilities built on the Web Crypto API
 *
 * Random identifiers, hashing, HMAC and base64url helpers used by the token
 * handlers, subject derivation and JWS signing.
 */

const encoder = new TextEncoder()

/**
 * Base64URL encode an ArrayBuffer or byte array (no padding)
 */
export function base64UrlEncode(buffer: ArrayBuffer | Uint8Array): string {
  const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer)
  let binary = ''
  for (const byte of bytes) {
    binary += String.fromCharCode(byte)
  }
  return btoa(binary)
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/, '')
}

/**
 * Base64URL decode a string to bytes
 */
export function base64UrlDecode(str: string) {
  const padded = str + '='.repeat((4 - (str.length % 4)) % 4)
  const base64 = padded.replace(/-/g, '+').replace(/_/g, '/')
  const binary = atob(base64)
  const bytes = new Uint8Array(binary.length)
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i)
  }
  return bytes
}

/**
 * Base64URL encode a UTF-8 string
 */
export function base64UrlEncodeString(value: string): string {
  return base64UrlEncode(encoder.encode(value))
}

/**
 * Base64URL decode to a UTF-8 string
 */
export function base64UrlDecodeString(value: string): string {
  return new TextDecoder().decode(base64UrlDecode(value))
}

/**
 * Constant-time string comparison.
 *
 * Both strings are hashed with SHA-256 first so the comparison runs over
 * fixed-length inputs regardless of the string lengths.
 */
export async function constantTimeEqual(a: string, b: string): Promise<boolean> {
  const [hashA, hashB] = await Promise.all([
    crypto.subtle.digest('SHA-256', encoder.encode(a)),
    crypto.subtle.digest('SHA-256', encoder.encode(b)),
  ])

  const bytesA = new Uint8Array(hashA)
  const bytesB = new Uint8Array(hashB)

  let result = 0
  for (let i = 0; i < 32; i++) {
    result |= bytesA[i] ^ bytesB[i]
  }

  return result === 0
}

/** Alphanumeric characters for token generation */
const ALPHANUMERIC_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'

/**
 * Generate a cryptographically random alphanumeric string.
 * Rejection sampling avoids modulo bias.
 */
export function generateToken(length: number = 32): string {
  const maxValid = 256 - (256 % ALPHANUMERIC_CHARS.length)

  let result = ''
  for (let i = 0; i < length; i++) {
    let value: number
    do {
      value = crypto.getRandomValues(new Uint8Array(1))[0]
    } while (value >= maxValid)
    result += ALPHANUMERIC_CHARS.charAt(value % ALPHANUMERIC_CHARS.length)
  }

  return result
}

/**
 * SHA-256 of a UTF-8 string, hex encoded
 */
export async function sha256Hex(value: string): Promise<string> {
  const hash = await crypto.subtle.digest('SHA-256', encoder.encode(value))
  return Array.from(new Uint8Array(hash), (b) => b.toString(16).padStart(2, '0')).join('')
}

/**
 * Import a raw secret as an HMAC-SHA256 key
 */
export async function importHmacKey(secret: string): Promise<CryptoKey> {
  return crypto.subtle.importKey('raw', encoder.encode(secret), { name: 'HMAC', hash: 'SHA-256' }, false, ['sign'])
}

/**
 * HMAC-SHA256 of a UTF-8 string, base64url encoded
 */
export async function hmacSha256(key: CryptoKey, data: string): Promise<string> {
  const signature = await crypto.subtle.sign('HMAC', key, encoder.encode(data))
  return base64UrlEncode(signature)
}
