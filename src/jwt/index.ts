export {
  SigningKeyManager,
  signJWT,
  generateSigningKey,
  exportKeysToJWKS,
  exportPublicKeyToJWKS,
  serializeSigningKey,
  deserializeSigningKey,
  isSigningAlg,
} from './signing'
export type {
  SigningAlg,
  SigningKey,
  SerializedSigningKey,
  JWKS,
  JWKSPublicKey,
  RSAPublicJWK,
  ECPublicJWK,
  JWSOptions,
  JwsSigner,
} from './signing'
export { decodeJWT, verifyJWT } from './verify'
export type { JWTHeader, JWTPayload, JWTVerifyOptions, JWTVerifyResult } from './verify'
