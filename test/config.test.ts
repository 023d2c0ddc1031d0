import { describe, it, expect, vi, afterEach } from 'vitest'
import { resolveProviderConfig } from '../src/oidc/config'
import { ConfigurationError } from '../src/errors'
import provider from './fixtures/provider.json'

const MINIMAL = { issuer: 'https://op.example.com', tokenKey: 'test-secret-token-key' }

describe('resolveProviderConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('applies defaults', () => {
    const config = resolveProviderConfig(MINIMAL)

    expect(config).toMatchObject({
      issuer: 'https://op.example.com',
      subjectSalt: 'salt',
      tokenLifetimes: { authorization_code: 300, access_token: 3600, refresh_token: 86400 },
      authnEventLifetime: 3600,
      addClaimsByScope: false,
      baseClaims: {},
      extensionScopes: {},
      bearerMethods: ['header'],
      userinfoSigningAlgValuesSupported: ['RS256', 'ES256'],
      debug: false,
    })
    expect(config.claimsSupported).toHaveLength(20)
    expect(config.claimsSupported).not.toContain('eduperson_scoped_affiliation')
  })

  it('advertises the claims of provider scopes by default', () => {
    const config = resolveProviderConfig(provider)

    expect(config.issuer).toBe('https://op.example.com')
    expect(config.subjectSalt).toBe('test-salt')
    expect(config.claimsSupported).toHaveLength(21)
    expect(config.claimsSupported).toContain('eduperson_scoped_affiliation')
  })

  it('keeps an explicit claims list and partial lifetimes', () => {
    const config = resolveProviderConfig({
      ...MINIMAL,
      claimsSupported: ['sub', 'email'],
      tokenLifetimes: { access_token: 60 },
      bearerMethods: ['header', 'query'],
      baseClaims: { id_token: ['email'] },
    })

    expect(config.claimsSupported).toEqual(['sub', 'email'])
    expect(config.tokenLifetimes).toEqual({ authorization_code: 300, access_token: 60, refresh_token: 86400 })
    expect(config.bearerMethods).toEqual(['header', 'query'])
    expect(config.baseClaims).toEqual({ id_token: ['email'] })
  })

  it.each([
    ['not an object', 'provider.json'],
    ['missing issuer', { tokenKey: 'test-secret-token-key' }],
    ['issuer that is not a URL', { ...MINIMAL, issuer: 'op.example.com' }],
    ['short token key', { ...MINIMAL, tokenKey: 'short' }],
    ['negative lifetime', { ...MINIMAL, tokenLifetimes: { access_token: -1 } }],
    ['zero freshness window', { ...MINIMAL, authnEventLifetime: 0 }],
    ['unknown bearer method', { ...MINIMAL, bearerMethods: ['cookie'] }],
    ['empty bearer methods', { ...MINIMAL, bearerMethods: [] }],
    ['unknown signing algorithm', { ...MINIMAL, userinfoSigningAlgValuesSupported: ['HS256'] }],
    ['unknown claims usage', { ...MINIMAL, baseClaims: { logout: ['sub'] } }],
    ['malformed extension scopes', { ...MINIMAL, extensionScopes: { rs: 'name' } }],
    ['non-boolean flag', { ...MINIMAL, addClaimsByScope: 'yes' }],
  ])('rejects %s', (_label, input) => {
    expect(() => resolveProviderConfig(input)).toThrow(ConfigurationError)
  })

  it('warns about provider scope claims that are not advertised when debugging', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    resolveProviderConfig({
      ...MINIMAL,
      debug: true,
      claimsSupported: ['sub', 'name'],
      extensionScopes: { research_and_scholarship: ['name', 'eduperson_scoped_affiliation'] },
    })

    expect(warn).toHaveBeenCalledWith('[OIDC] Scope research_and_scholarship names claims that are not advertised:', [
      'eduperson_scoped_affiliation',
    ])
  })
})
