export {
  ADDRESS_BYTES,
  addressToPublicKey,
  generateKeypair,
  identityFromAddress,
  identityFromKeypair,
  isRelayAddress,
  keypairFromSecretKey,
  publicKeyToAddress,
} from './keypair.js';
export type { RelayAddress, RelayIdentity, RelayKeypair } from './keypair.js';
export type { IdentityStorage, FileStorageOptions } from './storage.js';
export { MemoryStorage, FileStorageAdapter, encodeIdentity, decodeIdentity } from './storage.js';
export { IdentityManager } from './identity-manager.js';
