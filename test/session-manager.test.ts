import { describe, it, expect, beforeEach } from 'vitest'
import { SessionManager } from '../src/oidc/session-manager'
import { createTokenHandlers } from '../src/oidc/token-handler'
import { createAuthnEvent, extendAuthnEvent, isAuthnEventValid } from '../src/oidc/authn-event'
import { MemoryClientStore } from '../src/oidc/storage'
import { sha256Hex } from '../src/oidc/crypto'
import { deriveSubject } from '../src/oidc/subject'
import type { AuthorizationRequest } from '../src/oidc/types'
import {
  ConfigurationError,
  ExpiredOrRevokedToken,
  GrantNotFound,
  OidcError,
  SessionNotFound,
  TokenAlreadyUsed,
  TokenNotFound,
  WrongTokenKind,
} from '../src/errors'

const KEY = 'test-secret-token-key'
const START = 1_700_000_000

const AUTH_REQ: AuthorizationRequest = {
  client_id: 'client_1',
  redirect_uri: 'https://example.com/cb',
  scope: ['openid'],
  state: 'STATE',
  response_type: 'code',
}

describe('SessionManager', () => {
  let now: number
  let manager: SessionManager

  beforeEach(() => {
    now = START
    manager = new SessionManager({
      tokenHandlers: createTokenHandlers(KEY, { authorization_code: 300, access_token: 3600, refresh_token: 86400 }),
      subjectSalt: 'test-salt',
      clients: new MemoryClientStore([
        { client_id: 'client_2', redirect_uris: ['https://rp.example.net/cb'] },
      ]),
      clock: () => now,
    })
  })

  const newSession = (userId = 'diana', request: AuthorizationRequest = AUTH_REQ) =>
    manager.createSession(createAuthnEvent(userId, { authnTime: now }), request, userId)

  // ═══════════════════════════════════════════════════════════════════════════
  // Sessions
  // ═══════════════════════════════════════════════════════════════════════════

  describe('createSession', () => {
    it('registers a session with a public subject', async () => {
      const sessionId = await newSession()
      const session = manager.getSession(sessionId)

      expect(session).toMatchObject({ sessionId, userId: 'diana', clientId: 'client_1', subType: 'public', createdAt: START })
      expect(session.sub).toBe(await sha256Hex('dianatest-salt'))
    })

    it('returns the same session id for the same user and client, adding a grant each time', async () => {
      const first = await newSession()
      const second = await newSession()

      expect(second).toBe(first)
      const grants = manager.listGrants(first)
      expect(grants).toHaveLength(2)
      expect(manager.getGrant(first).id).toBe(grants[1]?.id)
    })

    it('gives different users different sessions', async () => {
      expect(await newSession('diana')).not.toBe(await newSession('babs'))
    })

    it('derives pairwise subjects per sector', async () => {
      const event = createAuthnEvent('diana', { authnTime: now })
      const a = await manager.createSession(event, AUTH_REQ, 'diana', { subType: 'pairwise' })
      const b = await manager.createSession(
        event,
        { ...AUTH_REQ, redirect_uri: 'https://other.example.org/cb' },
        'diana',
        { subType: 'pairwise' },
      )

      const subA = manager.getSession(a).sub
      expect(manager.getSession(a).sectorIdentifier).toBe('example.com')
      expect(subA).toBe(await sha256Hex('example.comdianatest-salt'))
      expect(manager.getSession(b).sub).not.toBe(subA)
    })

    it('falls back to the registered redirect URI for the pairwise sector', async () => {
      const sessionId = await manager.createSession(
        createAuthnEvent('diana', { authnTime: now }),
        { client_id: 'client_2', scope: ['openid'] },
        'diana',
        { subType: 'pairwise' },
      )
      expect(manager.getSession(sessionId).sectorIdentifier).toBe('rp.example.net')
    })

    it('refuses pairwise subjects without a sector', async () => {
      await expect(
        manager.createSession(
          createAuthnEvent('diana', { authnTime: now }),
          { client_id: 'unknown_client', scope: ['openid'] },
          'diana',
          { subType: 'pairwise' },
        ),
      ).rejects.toThrow(ConfigurationError)
    })

    it('keeps an ephemeral subject stable within the session', async () => {
      const event = createAuthnEvent('diana', { authnTime: now })
      const sessionId = await manager.createSession(event, AUTH_REQ, 'diana', { subType: 'ephemeral' })
      const sub = manager.getSession(sessionId).sub

      await manager.createSession(event, AUTH_REQ, 'diana', { subType: 'ephemeral' })
      expect(manager.getSession(sessionId).sub).toBe(sub)
      expect(manager.listGrants(sessionId).map((g) => g.sub)).toEqual([sub, sub])
      expect(sub).not.toBe(await sha256Hex('dianatest-salt'))
    })

    it('requires a client id', async () => {
      await expect(newSession('diana', { ...AUTH_REQ, client_id: '' })).rejects.toThrow(ConfigurationError)
    })

    it('takes a narrower scope than the request when given', async () => {
      const sessionId = await manager.createSession(
        createAuthnEvent('diana', { authnTime: now }),
        { ...AUTH_REQ, scope: ['openid', 'email', 'profile'] },
        'diana',
        { scope: ['openid', 'email'] },
      )
      expect(manager.getGrant(sessionId).scope).toEqual(['openid', 'email'])
    })
  })

  describe('lookups', () => {
    it('throws SessionNotFound for an unknown session', () => {
      expect(() => manager.getSession('nope')).toThrow(SessionNotFound)
      expect(manager.hasSession('nope')).toBe(false)
    })

    it('throws GrantNotFound for an unknown grant', async () => {
      const sessionId = await newSession()
      expect(() => manager.getGrant(sessionId, 'nope')).toThrow(GrantNotFound)
    })

    it('getSessionInfo optionally includes the grant', async () => {
      const sessionId = await newSession()
      const info = manager.getSessionInfo(sessionId, { grant: true })

      expect(info.userId).toBe('diana')
      expect(info.grant.id).toBe(manager.getGrant(sessionId).id)
      expect(manager.getSessionInfo(sessionId)).not.toHaveProperty('grant')
    })

    it('returns copies of the session attributes', async () => {
      const sessionId = await newSession()
      const info = manager.getSession(sessionId)
      info.userId = 'mallory'
      expect(manager.getSession(sessionId).userId).toBe('diana')
    })
  })

  describe('reauthenticate', () => {
    it('replaces the authentication event of the newest grant', async () => {
      const sessionId = await newSession()
      now += 7200
      expect(isAuthnEventValid(manager.getGrant(sessionId).authenticationEvent, now)).toBe(false)

      manager.reauthenticate(sessionId, createAuthnEvent('diana', { authnTime: now }))
      expect(isAuthnEventValid(manager.getGrant(sessionId).authenticationEvent, now)).toBe(true)
    })

    it('extendAuthnEvent pushes out the freshness window', () => {
      const event = createAuthnEvent('diana', { authnTime: START, lifetime: 60 })
      expect(event.validUntil).toBe(START + 60)
      expect(extendAuthnEvent(event, 30).validUntil).toBe(START + 90)
      expect(event.validUntil).toBe(START + 60)
    })
  })

  // ═══════════════════════════════════════════════════════════════════════════
  // Tokens
  // ═══════════════════════════════════════════════════════════════════════════

  describe('mintToken', () => {
    it('mints under the newest grant with the handler lifetime', async () => {
      const sessionId = await newSession()
      const token = await manager.mintToken(sessionId, 'access_token')

      expect(token).toMatchObject({
        kind: 'access_token',
        sessionId,
        grantId: manager.getGrant(sessionId).id,
        issuedAt: START,
        expiresAt: START + 3600,
        revoked: false,
      })
      expect(manager.getGrant(sessionId).tokens).toEqual([token])
    })

    it('keeps every token of concurrent mints for one session', async () => {
      const sessionId = await newSession()
      const tokens = await Promise.all(
        Array.from({ length: 25 }, () => manager.mintToken(sessionId, 'access_token')),
      )

      expect(new Set(tokens.map((t) => t.value)).size).toBe(25)
      expect(manager.getGrant(sessionId).tokens).toHaveLength(25)
      for (const token of tokens) {
        expect(manager.resolveToken(token.value).token).toBe(token)
      }
    })

    it('registers the value for resolution', async () => {
      const sessionId = await newSession()
      const token = await manager.mintToken(sessionId, 'refresh_token', { expiresAt: START + 10 })

      const resolved = manager.resolveToken(token.value)
      expect(resolved.token).toBe(token)
      expect(resolved.session.sessionId).toBe(sessionId)
      expect(resolved.grant.id).toBe(token.grantId)
    })

    it('mints under an explicit grant', async () => {
      const sessionId = await newSession()
      const oldGrant = manager.getGrant(sessionId)
      await newSession()

      const token = await manager.mintToken(sessionId, 'access_token', { grantId: oldGrant.id })
      expect(token.grantId).toBe(oldGrant.id)
      expect(oldGrant.tokens).toHaveLength(1)
    })

    it('rejects an expiry that is not in the future', async () => {
      const sessionId = await newSession()
      await expect(manager.mintToken(sessionId, 'access_token', { expiresAt: START })).rejects.toThrow(
        ConfigurationError,
      )
      await expect(manager.mintToken(sessionId, 'access_token', { expiresAt: Number.NaN })).rejects.toThrow(
        ConfigurationError,
      )
    })

    it('rejects a parent token that is not part of the grant', async () => {
      const sessionId = await newSession()
      await expect(manager.mintToken(sessionId, 'access_token', { basedOn: 'unknown' })).rejects.toThrow(
        TokenNotFound,
      )
    })

    it('refuses to mint under a revoked grant', async () => {
      const sessionId = await newSession()
      manager.revokeGrant(sessionId)

      const attempt = manager.mintToken(sessionId, 'access_token')
      await expect(attempt).rejects.toThrow(OidcError)
      await expect(attempt).rejects.toMatchObject({ code: 'invalid_grant' })
    })

    it('fails for an unknown session', async () => {
      await expect(manager.mintToken('nope', 'access_token')).rejects.toThrow(SessionNotFound)
    })
  })

  describe('resolveToken and decodeToken', () => {
    it('throws TokenNotFound for unknown values', () => {
      expect(() => manager.resolveToken('at.unknown.value')).toThrow(TokenNotFound)
    })

    it('decodes a value with the handler of its kind', async () => {
      const sessionId = await newSession()
      const token = await manager.mintToken(sessionId, 'authorization_code')

      const payload = await manager.decodeToken(token.value)
      expect(payload).toMatchObject({ kind: 'authorization_code', sid: sessionId, exp: START + 300 })
      expect(await manager.decodeToken('rt.bogus.value')).toBeNull()
    })

    it('isTokenActive follows expiry and revocation', async () => {
      const sessionId = await newSession()
      const token = await manager.mintToken(sessionId, 'access_token', { expiresAt: START + 10 })

      expect(manager.isTokenActive(token)).toBe(true)
      expect(manager.isTokenActive(token, START + 10)).toBe(false)
      manager.revokeToken(token.value)
      expect(manager.isTokenActive(token)).toBe(false)
    })
  })

  describe('revocation', () => {
    it('revokes a single token', async () => {
      const sessionId = await newSession()
      const code = await manager.mintToken(sessionId, 'authorization_code')
      const access = await manager.mintToken(sessionId, 'access_token', { basedOn: code })

      expect(manager.revokeToken(code.value)).toEqual([code])
      expect(code.revoked).toBe(true)
      expect(access.revoked).toBe(false)
    })

    it('revokes derived tokens recursively', async () => {
      const sessionId = await newSession()
      const code = await manager.mintToken(sessionId, 'authorization_code')
      const access = await manager.mintToken(sessionId, 'access_token', { basedOn: code })
      const refresh = await manager.mintToken(sessionId, 'refresh_token', { basedOn: access.value })
      const unrelated = await manager.mintToken(sessionId, 'access_token')

      const changed = manager.revokeToken(code.value, { recursive: true })
      expect(changed).toEqual([code, access, refresh])
      expect(unrelated.revoked).toBe(false)
    })

    it('revokeGrant revokes every token of the grant', async () => {
      const sessionId = await newSession()
      const a = await manager.mintToken(sessionId, 'access_token')
      const b = await manager.mintToken(sessionId, 'refresh_token')

      manager.revokeGrant(sessionId)
      expect(manager.getGrant(sessionId).isActive()).toBe(false)
      expect([a.revoked, b.revoked]).toEqual([true, true])
    })

    it('revocation cannot be undone through a token or grant a caller holds', async () => {
      const sessionId = await newSession()
      const token = await manager.mintToken(sessionId, 'access_token')
      manager.revokeGrant(sessionId)
      const grant = manager.getGrant(sessionId)

      expect(Reflect.set(token, 'revoked', false)).toBe(false)
      expect(Reflect.set(grant, 'revoked', false)).toBe(false)
      expect(manager.resolveToken(token.value).token.revoked).toBe(true)
      expect(grant.revoked).toBe(true)
      expect(manager.isTokenActive(token)).toBe(false)
    })

    it('returns a copy of the token list', async () => {
      const sessionId = await newSession()
      await manager.mintToken(sessionId, 'access_token')

      manager.getGrant(sessionId).tokens.length = 0
      expect(manager.getGrant(sessionId).tokens).toHaveLength(1)
    })

    it('deleteSession forgets the session and its tokens', async () => {
      const sessionId = await newSession()
      const token = await manager.mintToken(sessionId, 'access_token')

      manager.deleteSession(sessionId)
      expect(manager.hasSession(sessionId)).toBe(false)
      expect(() => manager.resolveToken(token.value)).toThrow(TokenNotFound)
    })
  })

  describe('consumeAuthorizationCode', () => {
    it('marks the code as used on first use', async () => {
      const sessionId = await newSession()
      const code = await manager.mintToken(sessionId, 'authorization_code')

      const { token } = manager.consumeAuthorizationCode(code.value)
      expect(token.usedAt).toBe(START)
    })

    it('keeps the use time of a code out of reach of its holders', async () => {
      const sessionId = await newSession()
      const code = await manager.mintToken(sessionId, 'authorization_code')
      manager.consumeAuthorizationCode(code.value)

      expect(Reflect.set(code, 'usedAt', undefined)).toBe(false)
      expect(code.usedAt).toBe(START)
      expect(() => manager.consumeAuthorizationCode(code.value)).toThrow(TokenAlreadyUsed)
    })

    it('revokes everything minted from a code that is presented twice', async () => {
      const sessionId = await newSession()
      const code = await manager.mintToken(sessionId, 'authorization_code')
      manager.consumeAuthorizationCode(code.value)
      const access = await manager.mintToken(sessionId, 'access_token', { basedOn: code })

      expect(() => manager.consumeAuthorizationCode(code.value)).toThrow(TokenAlreadyUsed)
      expect(code.revoked).toBe(true)
      expect(access.revoked).toBe(true)
    })

    it('rejects an expired code', async () => {
      const sessionId = await newSession()
      const code = await manager.mintToken(sessionId, 'authorization_code')
      now += 300

      expect(() => manager.consumeAuthorizationCode(code.value)).toThrow(ExpiredOrRevokedToken)
    })

    it('rejects other kinds of token', async () => {
      const sessionId = await newSession()
      const access = await manager.mintToken(sessionId, 'access_token')

      expect(() => manager.consumeAuthorizationCode(access.value)).toThrow(WrongTokenKind)
    })
  })
})

describe('deriveSubject', () => {
  it('needs a sector for pairwise and a nonce for ephemeral', async () => {
    await expect(
      deriveSubject({ userId: 'diana', clientId: 'client_1', subType: 'pairwise', salt: 'test-salt' }),
    ).rejects.toThrow(ConfigurationError)
    await expect(
      deriveSubject({ userId: 'diana', clientId: 'client_1', subType: 'ephemeral', salt: 'test-salt' }),
    ).rejects.toThrow(ConfigurationError)
  })

  it('gives the same public subject to every client', async () => {
    const a = await deriveSubject({ userId: 'diana', clientId: 'client_1', subType: 'public', salt: 'test-salt' })
    const b = await deriveSubject({ userId: 'diana', clientId: 'client_2', subType: 'public', salt: 'test-salt' })
    expect(a).toBe(b)
  })

  it('mixes the nonce into ephemeral subjects', async () => {
    const input = { userId: 'diana', clientId: 'client_1', subType: 'ephemeral' as const, salt: 'test-salt' }
    const a = await deriveSubject({ ...input, nonce: 'nonce-a' })
    const b = await deriveSubject({ ...input, nonce: 'nonce-b' })
    expect(a).toBe(await sha256Hex('dianaclient_1nonce-a'))
    expect(a).not.toBe(b)
  })
})
