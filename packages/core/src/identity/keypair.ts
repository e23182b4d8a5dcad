import nacl from 'tweetnacl';
import { bytesToHex, hexToBytes } from '../crypto/hex.js';

/** Curve25519 key material used to peel onion layers addressed to this node. */
export interface RelayKeypair {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

/** Lowercase hex of a node's 32-byte packet public key. */
export type RelayAddress = string;

export interface RelayIdentity {
  readonly address: RelayAddress;
  readonly publicKey: Uint8Array;
}

export const ADDRESS_BYTES = 32;

const ADDRESS_PATTERN = /^[0-9a-f]{64}$/;

export function generateKeypair(): RelayKeypair {
  const pair = nacl.box.keyPair();
  return { publicKey: pair.publicKey, secretKey: pair.secretKey };
}

export function keypairFromSecretKey(secretKey: Uint8Array): RelayKeypair {
  const pair = nacl.box.keyPair.fromSecretKey(secretKey);
  return { publicKey: pair.publicKey, secretKey: pair.secretKey };
}

export function publicKeyToAddress(publicKey: Uint8Array): RelayAddress {
  return bytesToHex(publicKey);
}

export function isRelayAddress(value: string): boolean {
  return ADDRESS_PATTERN.test(value);
}

export function addressToPublicKey(address: RelayAddress): Uint8Array {
  if (!isRelayAddress(address)) {
    throw new Error(`Invalid relay address: ${address}`);
  }
  return hexToBytes(address);
}

export function identityFromAddress(address: RelayAddress): RelayIdentity {
  return Object.freeze({ address, publicKey: addressToPublicKey(address) });
}

export function identityFromKeypair(keypair: RelayKeypair): RelayIdentity {
  return Object.freeze({ address: publicKeyToAddress(keypair.publicKey), publicKey: keypair.publicKey });
}
