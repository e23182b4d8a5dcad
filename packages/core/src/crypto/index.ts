export { bytesToHex, hexToBytes, concatBytes, xorBytes } from './hex.js';
export { secureRandom, secureRandomBytes, secureRandomHex, sequenceRandom } from './secure-random.js';
export type { RandomSource } from './secure-random.js';
