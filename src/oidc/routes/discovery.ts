/**
 * Discovery / Well-Known endpoints
 *
 * - GET /.well-known/openid-configuration (OpenID Connect Discovery 1.0)
 * - GET /.well-known/jwks.json (JWKS endpoint)
 */

import { Hono } from 'hono'
import type { ServerContext } from './context'
import { SUBJECT_TYPES } from '../types'

/**
 * Create the discovery routes sub-app
 */
export function createDiscoveryRoutes(ctx: ServerContext): Hono {
  const app = new Hono()

  /**
   * Provider metadata, limited to what this provider serves
   */
  app.get('/.well-known/openid-configuration', (c) => {
    const { issuer, claimsSupported, userinfoSigningAlgValuesSupported } = ctx.config
    const metadata = {
      issuer,
      userinfo_endpoint: `${issuer}/userinfo`,
      jwks_uri: `${issuer}/.well-known/jwks.json`,
      scopes_supported: ctx.scopes.scopes(),
      claims_supported: claimsSupported,
      subject_types_supported: SUBJECT_TYPES,
      userinfo_signing_alg_values_supported: userinfoSigningAlgValuesSupported,
    }

    return c.json(metadata)
  })

  /**
   * JWKS endpoint - every public key, current and rotated
   */
  app.get('/.well-known/jwks.json', async (c) => {
    const jwks = await ctx.signer.getJWKS()
    return c.json(jwks)
  })

  return app
}
