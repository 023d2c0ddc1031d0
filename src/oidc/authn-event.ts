/**
 * Authentication events
 *
 * An authentication event records when and how a user authenticated. Its
 * `validUntil` is fixed when the event is created and only moves through
 * an explicit `extendAuthnEvent` call.
 */

import type { AuthenticationEvent } from './types'
import { nowSeconds } from './helpers'

/** Default freshness window: one hour */
export const DEFAULT_AUTHN_EVENT_LIFETIME = 3600

/** Authentication context class for password-over-the-network logins */
export const INTERNET_PROTOCOL_PASSWORD = 'urn:oasis:names:tc:SAML:2.0:ac:classes:InternetProtocolPassword'

export interface AuthnEventOptions {
  /** Authentication context class reference */
  acr?: string
  /** When the user authenticated (default: now) */
  authnTime?: number
  /** Freshness window in seconds (default: 3600) */
  lifetime?: number
  /** Free-form authentication method information */
  authnInfo?: string
}

export function createAuthnEvent(uid: string, options: AuthnEventOptions = {}): AuthenticationEvent {
  const {
    acr = INTERNET_PROTOCOL_PASSWORD,
    authnTime = nowSeconds(),
    lifetime = DEFAULT_AUTHN_EVENT_LIFETIME,
    authnInfo,
  } = options

  return {
    uid,
    acr,
    authnTime,
    validUntil: authnTime + lifetime,
    ...(authnInfo !== undefined && { authnInfo }),
  }
}

/**
 * Whether the event is still inside its freshness window
 */
export function isAuthnEventValid(event: AuthenticationEvent, now: number = nowSeconds()): boolean {
  return now < event.validUntil
}

/**
 * Return a copy of the event with the freshness window pushed out by `seconds`
 */
export function extendAuthnEvent(event: AuthenticationEvent, seconds: number): AuthenticationEvent {
  return { ...event, validUntil: event.validUntil + seconds }
}
