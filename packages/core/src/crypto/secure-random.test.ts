import { describe, expect, it } from 'vitest';
import { secureRandom, secureRandomBytes, secureRandomHex, sequenceRandom } from './secure-random.js';

describe('secureRandomBytes', () => {
  it('should generate bytes of specified length', () => {
    const bytes = secureRandomBytes(16);
    expect(bytes).toBeInstanceOf(Uint8Array);
    expect(bytes.length).toBe(16);
  });

  it('should generate different bytes on each call', () => {
    const str1 = Array.from(secureRandomBytes(32)).join(',');
    const str2 = Array.from(secureRandomBytes(32)).join(',');
    expect(str1).not.toBe(str2);
  });
});

describe('secureRandomHex', () => {
  it('should generate hex string of specified length', () => {
    const hex = secureRandomHex(32);
    expect(hex).toMatch(/^[0-9a-f]{32}$/);
  });

  it('should handle odd lengths', () => {
    expect(secureRandomHex(7)).toMatch(/^[0-9a-f]{7}$/);
  });
});

describe('secureRandom', () => {
  it('stays within [0, 1)', () => {
    for (let i = 0; i < 200; i++) {
      const value = secureRandom();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('sequenceRandom', () => {
  it('cycles through the provided values', () => {
    const random = sequenceRandom([0.1, 0.9]);
    expect([random(), random(), random()]).toEqual([0.1, 0.9, 0.1]);
  });

  it('rejects an empty sequence', () => {
    expect(() => sequenceRandom([])).toThrow('at least one value');
  });
});
