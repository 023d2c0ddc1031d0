/**
 * Shared helpers for the provider core
 *
 * Time, scope and sector-identifier utilities used across the session
 * manager, the claims interface and the UserInfo endpoint.
 */

/**
 * A source of the current time in whole seconds since the epoch
 */
export type Clock = () => number

/**
 * Current time in whole seconds since the epoch
 */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000)
}

/**
 * Normalize a scope parameter (space separated string or list) to a list
 * with duplicates removed, keeping first-seen order.
 */
export function parseScope(scope: string | string[] | undefined): string[] {
  const items = Array.isArray(scope) ? scope : (scope ?? '').split(/\s+/)
  return dedupe(items.filter(Boolean))
}

/**
 * Remove duplicates from a list, keeping first-seen order
 */
export function dedupe<T>(items: Iterable<T>): T[] {
  return Array.from(new Set(items))
}

/**
 * Host part of a URI, or undefined if it does not parse as a URL
 */
export function hostOf(uri: string | undefined): string | undefined {
  if (!uri) return undefined
  try {
    const host = new URL(uri).host
    return host || undefined
  } catch {
    return undefined
  }
}

/**
 * Resolve the sector identifier used for pairwise subject derivation.
 *
 * Order: explicit value, `sector_identifier_uri` from the authorization
 * request or client registration, then the host of the redirect URI
 * (OpenID Connect Core Section 8.1).
 */
export function resolveSectorIdentifier(options: {
  explicit?: string | undefined
  sectorIdentifierUri?: string | undefined
  redirectUri?: string | undefined
}): string | undefined {
  if (options.explicit) return hostOf(options.explicit) ?? options.explicit
  return hostOf(options.sectorIdentifierUri) ?? hostOf(options.redirectUri)
}

/**
 * First characters of a token value, for log lines
 */
export function tokenPrefix(value: string): string {
  return `${value.slice(0, 8)}…`
}
