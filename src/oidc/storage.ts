/**
 * Storage interfaces for user attributes and registered clients
 *
 * The core only reads from these stores. Concrete backends (a database, a
 * directory service, a JSON file) implement the interfaces; the in-memory
 * implementations below are used for tests and small deployments.
 */

import type { ClientMetadata, UserClaims } from './types'
import { assertValid, isClientMetadata, isUserDatabase } from './guards'

/**
 * Source of user attribute values
 */
export interface UserInfoStore {
  /**
   * Values of the named claims for a user. Claims the user does not have are
   * left out; an unknown user yields an empty object.
   */
  getUserClaims(userId: string, claimNames: string[]): Promise<UserClaims>
}

/**
 * Registered client lookup
 */
export interface ClientStore {
  /**
   * Get a client by ID
   */
  getClient(clientId: string): Promise<ClientMetadata | null>

  /**
   * Save a client (create or update)
   */
  saveClient(client: ClientMetadata): Promise<void>

  /**
   * Delete a client
   */
  deleteClient(clientId: string): Promise<void>
}

/**
 * In-memory user attribute store
 *
 * @example
 * ```typescript
 * const users = MemoryUserInfoStore.fromJSON(JSON.parse(readFileSync('users.json', 'utf8')))
 * await users.getUserClaims('diana', ['email', 'name'])
 * ```
 */
export class MemoryUserInfoStore implements UserInfoStore {
  private users = new Map<string, UserClaims>()

  constructor(users: Record<string, UserClaims> = {}) {
    for (const [id, claims] of Object.entries(users)) {
      this.users.set(id, { ...claims })
    }
  }

  /**
   * Build a store from parsed JSON of the form `{ [userId]: { claim: value } }`
   */
  static fromJSON(data: unknown): MemoryUserInfoStore {
    return new MemoryUserInfoStore(assertValid(data, isUserDatabase, 'user database'))
  }

  async getUserClaims(userId: string, claimNames: string[]): Promise<UserClaims> {
    const user = this.users.get(userId)
    if (!user) return {}

    const result: UserClaims = {}
    for (const name of claimNames) {
      if (name in user) result[name] = user[name]
    }
    return result
  }

  async saveUser(userId: string, claims: UserClaims): Promise<void> {
    this.users.set(userId, { ...claims })
  }

  async deleteUser(userId: string): Promise<void> {
    this.users.delete(userId)
  }
}

/**
 * In-memory client registry
 */
export class MemoryClientStore implements ClientStore {
  private clients = new Map<string, ClientMetadata>()

  constructor(clients: ClientMetadata[] = []) {
    for (const client of clients) {
      this.clients.set(client.client_id, { ...client })
    }
  }

  /**
   * Build a registry from parsed JSON: a list of client metadata objects
   */
  static fromJSON(data: unknown): MemoryClientStore {
    if (!Array.isArray(data)) {
      return new MemoryClientStore([assertValid(data, isClientMetadata, 'client metadata')])
    }
    return new MemoryClientStore(data.map((entry) => assertValid(entry, isClientMetadata, 'client metadata')))
  }

  async getClient(clientId: string): Promise<ClientMetadata | null> {
    return this.clients.get(clientId) ?? null
  }

  async saveClient(client: ClientMetadata): Promise<void> {
    this.clients.set(client.client_id, { ...client })
  }

  async deleteClient(clientId: string): Promise<void> {
    this.clients.delete(clientId)
  }
}
