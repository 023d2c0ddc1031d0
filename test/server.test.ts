import { describe, it, expect, beforeEach } from 'vitest'
import { createOidcServer } from '../src/oidc/server'
import type { OidcServer } from '../src/oidc/server'
import { createAuthnEvent } from '../src/oidc/authn-event'
import { MemoryClientStore, MemoryUserInfoStore } from '../src/oidc/storage'
import { ConfigurationError } from '../src/errors'
import type { Token } from '../src/oidc/types'
import users from './fixtures/users.json'
import clients from './fixtures/clients.json'
import provider from './fixtures/provider.json'

describe('createOidcServer', () => {
  let server: OidcServer

  beforeEach(() => {
    server = createOidcServer({
      provider: { ...provider, addClaimsByScope: true },
      users: MemoryUserInfoStore.fromJSON(users),
      clients: MemoryClientStore.fromJSON(clients),
    })
  })

  const mintAccessToken = async (clientId = 'client_1', scope = ['openid', 'email']): Promise<Token> => {
    const sessionId = await server.sessionManager.createSession(
      createAuthnEvent('diana'),
      { client_id: clientId, redirect_uri: 'https://example.com/cb', scope },
      'diana',
    )
    return server.sessionManager.mintToken(sessionId, 'access_token')
  }

  it('refuses an invalid provider configuration', () => {
    expect(() => createOidcServer({ provider: { issuer: 'https://op.example.com' } })).toThrow(ConfigurationError)
  })

  it('serves provider metadata', async () => {
    const res = await server.app.request('/.well-known/openid-configuration')
    expect(res.status).toBe(200)

    const metadata = await res.json()
    expect(metadata.issuer).toBe('https://op.example.com')
    expect(metadata.userinfo_endpoint).toBe('https://op.example.com/userinfo')
    expect(metadata.jwks_uri).toBe('https://op.example.com/.well-known/jwks.json')
    expect(metadata.scopes_supported).toContain('research_and_scholarship')
    expect(metadata.claims_supported).toHaveLength(21)
    expect(metadata.subject_types_supported).toEqual(['public', 'pairwise', 'ephemeral'])
    expect(metadata.userinfo_signing_alg_values_supported).toEqual(['RS256', 'ES256'])
  })

  it('serves the public signing keys', async () => {
    const res = await server.app.request('/.well-known/jwks.json')
    expect(res.status).toBe(200)

    const jwks = await res.json()
    expect(jwks.keys).toHaveLength(2)
    for (const key of jwks.keys) {
      expect(key).not.toHaveProperty('d')
    }
  })

  it('answers GET /userinfo with the claims of the grant', async () => {
    const token = await mintAccessToken()
    const res = await server.app.request('/userinfo', { headers: { Authorization: `Bearer ${token.value}` } })

    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('application/json')
    expect(await res.json()).toEqual({
      sub: server.sessionManager.getSession(token.sessionId).sub,
      email: 'diana@example.org',
      email_verified: true,
    })
  })

  it('answers POST /userinfo', async () => {
    const token = await mintAccessToken()
    const res = await server.app.request('/userinfo', {
      method: 'POST',
      headers: { Authorization: `Bearer ${token.value}`, 'Content-Type': 'application/x-www-form-urlencoded' },
      body: '',
    })
    expect(res.status).toBe(200)
  })

  it('accepts the token as a form parameter when enabled', async () => {
    server = createOidcServer({
      provider: { ...provider, bearerMethods: ['header', 'body'] },
      users: MemoryUserInfoStore.fromJSON(users),
      clients: MemoryClientStore.fromJSON(clients),
    })
    const token = await mintAccessToken()
    const res = await server.app.request('/userinfo', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: `access_token=${encodeURIComponent(token.value)}`,
    })

    expect(res.status).toBe(200)
    expect((await res.json()).sub).toBe(server.sessionManager.getSession(token.sessionId).sub)
  })

  it('accepts the token as a query parameter when enabled', async () => {
    server = createOidcServer({
      provider: { ...provider, bearerMethods: ['header', 'query'] },
      users: MemoryUserInfoStore.fromJSON(users),
      clients: MemoryClientStore.fromJSON(clients),
    })
    const token = await mintAccessToken()
    const res = await server.app.request(`/userinfo?access_token=${encodeURIComponent(token.value)}`)

    expect(res.status).toBe(200)
    expect((await res.json()).sub).toBe(server.sessionManager.getSession(token.sessionId).sub)
  })

  it('ignores a form parameter token when only the header is enabled', async () => {
    const token = await mintAccessToken()
    const res = await server.app.request('/userinfo', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: `access_token=${encodeURIComponent(token.value)}`,
    })

    expect(res.status).toBe(401)
    expect(res.headers.get('www-authenticate')).toBe('Bearer realm="https://op.example.com"')
  })

  it('returns a signed response for clients that ask for one', async () => {
    const token = await mintAccessToken('client_signed')
    const res = await server.app.request('/userinfo', { headers: { Authorization: `Bearer ${token.value}` } })

    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('application/jwt')
    expect((await res.text()).split('.')).toHaveLength(3)
  })

  it('challenges a request without a valid token', async () => {
    const res = await server.app.request('/userinfo', { headers: { Authorization: 'Bearer invalid' } })

    expect(res.status).toBe(401)
    expect(res.headers.get('www-authenticate')).toBe('Bearer realm="https://op.example.com", error="invalid_token"')
    expect(await res.json()).toEqual({ error: 'invalid_token', error_description: 'Invalid Token' })
  })

  it('challenges a request with no token at all', async () => {
    const res = await server.app.request('/userinfo')

    expect(res.status).toBe(401)
    expect(res.headers.get('www-authenticate')).toBe('Bearer realm="https://op.example.com"')
  })
})
