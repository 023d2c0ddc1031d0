import type { ProviderConfig } from '../config'
import type { ScopeRegistry } from '../scopes'
import type { SigningKeyManager } from '../../jwt/signing'
import type { UserInfoEndpoint } from '../userinfo'

/**
 * Shared state handed to every route module
 */
export interface ServerContext {
  config: ProviderConfig
  scopes: ScopeRegistry
  signer: SigningKeyManager
  userinfo: UserInfoEndpoint
}
