/**
 * Secure random helpers backed by TweetNaCl's CSPRNG.
 *
 * `RandomSource` is the injectable shape used wherever a choice must be unpredictable
 * (path selection); tests pass a seeded sequence instead.
 */

import nacl from 'tweetnacl';
import { bytesToHex } from './hex.js';

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export function secureRandomBytes(length: number): Uint8Array {
  return nacl.randomBytes(length);
}

export function secureRandomHex(length: number): string {
  const bytes = secureRandomBytes(Math.ceil(length / 2));
  return bytesToHex(bytes).slice(0, length);
}

export const secureRandom: RandomSource = () => {
  const bytes = secureRandomBytes(4);
  const value = ((bytes[0] ?? 0) << 24) | ((bytes[1] ?? 0) << 16) | ((bytes[2] ?? 0) << 8) | (bytes[3] ?? 0);
  return (value >>> 0) / 0x1_0000_0000;
};

/**
 * Deterministic source cycling through the given values. For tests and reproducible simulations.
 */
export function sequenceRandom(values: number[]): RandomSource {
  if (values.length === 0) {
    throw new Error('sequenceRandom needs at least one value');
  }
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index++;
    return value;
  };
}
