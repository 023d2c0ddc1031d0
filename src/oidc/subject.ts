/**
 * Subject identifier derivation (OpenID Connect Core Section 8)
 */

import { ConfigurationError } from '../errors'
import type { SubjectType } from './types'
import { sha256Hex } from './crypto'

export interface SubjectInput {
  userId: string
  clientId: string
  subType: SubjectType
  salt: string
  /** Required for pairwise subjects */
  sectorIdentifier?: string | undefined
  /** Required for ephemeral subjects; fixed when the session is created */
  nonce?: string | undefined
}

/**
 * Derive the externally visible `sub` value.
 *
 * - public: one value per user across all clients
 * - pairwise: one value per user and sector
 * - ephemeral: one value per user, client and session nonce
 */
export async function deriveSubject(input: SubjectInput): Promise<string> {
  const { userId, clientId, subType, salt, sectorIdentifier, nonce } = input

  switch (subType) {
    case 'public':
      return sha256Hex(`${userId}${salt}`)
    case 'pairwise':
      if (!sectorIdentifier) {
        throw new ConfigurationError('Pairwise subject requires a sector identifier')
      }
      return sha256Hex(`${sectorIdentifier}${userId}${salt}`)
    case 'ephemeral':
      if (!nonce) {
        throw new ConfigurationError('Ephemeral subject requires a session nonce')
      }
      return sha256Hex(`${userId}${clientId}${nonce}`)
  }
}
