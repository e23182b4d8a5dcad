import { describe, expect, it } from 'vitest';
import {
  addressToPublicKey,
  generateKeypair,
  identityFromAddress,
  identityFromKeypair,
  isRelayAddress,
  keypairFromSecretKey,
  publicKeyToAddress,
} from './keypair.js';

describe('keypair', () => {
  it('generates a Curve25519 keypair', () => {
    const keypair = generateKeypair();
    expect(keypair.publicKey).toBeInstanceOf(Uint8Array);
    expect(keypair.publicKey.length).toBe(32);
    expect(keypair.secretKey.length).toBe(32);
  });

  it('generates unique keypairs', () => {
    const a = generateKeypair();
    const b = generateKeypair();
    expect(a.publicKey).not.toEqual(b.publicKey);
  });

  it('restores the public key from the secret key', () => {
    const keypair = generateKeypair();
    expect(keypairFromSecretKey(keypair.secretKey).publicKey).toEqual(keypair.publicKey);
  });

  it('converts public key to hex address and back', () => {
    const keypair = generateKeypair();
    const address = publicKeyToAddress(keypair.publicKey);
    expect(address).toMatch(/^[0-9a-f]{64}$/);
    expect(addressToPublicKey(address)).toEqual(keypair.publicKey);
  });

  it('validates address format', () => {
    expect(isRelayAddress('a'.repeat(64))).toBe(true);
    expect(isRelayAddress('A'.repeat(64))).toBe(false);
    expect(isRelayAddress('a'.repeat(63))).toBe(false);
    expect(() => addressToPublicKey('relay-1')).toThrow('Invalid relay address');
  });

  it('builds identities from an address or a keypair', () => {
    const keypair = generateKeypair();
    const fromKeys = identityFromKeypair(keypair);
    const fromAddress = identityFromAddress(fromKeys.address);
    expect(fromAddress.address).toBe(fromKeys.address);
    expect(fromAddress.publicKey).toEqual(keypair.publicKey);
    expect(Object.isFrozen(fromAddress)).toBe(true);
  });
});
