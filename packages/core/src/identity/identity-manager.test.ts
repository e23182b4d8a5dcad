import { describe, expect, it } from 'vitest';
import { IdentityManager } from './identity-manager.js';
import { MemoryStorage } from './storage.js';

describe('IdentityManager', () => {
  it('generates new keypair when no stored identity exists', async () => {
    const manager = new IdentityManager(new MemoryStorage());
    const keypair = await manager.init();
    expect(keypair.publicKey).toBeInstanceOf(Uint8Array);
    expect(keypair.publicKey.length).toBe(32);
    expect(keypair.secretKey.length).toBe(32);
  });

  it('loads existing keypair from storage without generating new one', async () => {
    const storage = new MemoryStorage();
    const first = await new IdentityManager(storage).init();
    const second = await new IdentityManager(storage).init();
    expect(second.publicKey).toEqual(first.publicKey);
    expect(second.secretKey).toEqual(first.secretKey);
  });

  it('getAddress returns consistent hex string', async () => {
    const manager = new IdentityManager(new MemoryStorage());
    await manager.init();
    expect(manager.getAddress()).toBe(manager.getAddress());
    expect(manager.getAddress()).toMatch(/^[0-9a-f]{64}$/);
    expect(manager.getIdentity().address).toBe(manager.getAddress());
  });

  it('throws if used before init', () => {
    const manager = new IdentityManager(new MemoryStorage());
    expect(() => manager.getAddress()).toThrow('not initialized');
    expect(() => manager.getKeypair()).toThrow('not initialized');
  });
});
