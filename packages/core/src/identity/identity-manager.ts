import {
  type RelayAddress,
  type RelayIdentity,
  type RelayKeypair,
  generateKeypair,
  identityFromKeypair,
} from './keypair.js';
import type { IdentityStorage } from './storage.js';

export class IdentityManager {
  private storage: IdentityStorage;
  private keypair: RelayKeypair | null = null;

  constructor(storage: IdentityStorage) {
    this.storage = storage;
  }

  /** Load the stored keypair, or create and persist a new one. */
  async init(): Promise<RelayKeypair> {
    const existing = await this.storage.load();
    if (existing) {
      this.keypair = existing;
      return existing;
    }

    const created = generateKeypair();
    await this.storage.save(created);
    this.keypair = created;
    return created;
  }

  getKeypair(): RelayKeypair {
    if (!this.keypair) {
      throw new Error('IdentityManager not initialized. Call init() first.');
    }
    return this.keypair;
  }

  getIdentity(): RelayIdentity {
    return identityFromKeypair(this.getKeypair());
  }

  getAddress(): RelayAddress {
    return this.getIdentity().address;
  }
}
