import { describe, it, expect } from 'vitest';
import { combine128, fold128To64 } from './digest.ts';
import {
  hash128,
  hash64,
  hashSequence128,
  hashSequence64,
  hashValue128,
  hashValue64,
  isSequence
} from './hashing.ts';
import { createWordSource } from './test/uniformDigests.ts';
import { FlexValue, type OpaqueValue } from './value.ts';

/** Test suite label for value and sequence hashing. */
const SUITE = 'hashing';

function fixed(d64: bigint, d128: bigint): OpaqueValue {
  return { digest64: () => d64, digest128: () => d128 };
}

function randomIntegers(seed: number, count: number): FlexValue[] {
  const next = createWordSource(seed);
  return Array.from({ length: count }, () => FlexValue.integer(next()));
}

describe(SUITE, () => {
  it('passes single values through to their own digests', () => {
    const value = fixed(7n, 9n);
    expect(hashValue64(value)).toBe(7n);
    expect(hashValue128(value)).toBe(9n);
    expect(hash64(value)).toBe(7n);
    expect(hash128(value)).toBe(9n);
  });

  it('is deterministic for values', () => {
    const value = FlexValue.from({ id: 12, tags: ['a', 'b'] });
    expect(hash64(value)).toBe(hash64(value));
    expect(hash128(value)).toBe(hash128(value));
  });

  it('hashes the empty sequence exactly like the integer 0', () => {
    expect(hash128([])).toBe(hash128(FlexValue.integer(0)));
    expect(hash64([])).toBe(fold128To64(hash128(FlexValue.integer(0))));
  });

  it('seeds with the length and folds elements in order', () => {
    const a = fixed(1n, 11n);
    const b = fixed(2n, 22n);
    const expected = combine128(combine128(hash128(FlexValue.integer(2)), 11n), 22n);
    expect(hashSequence128([a, b])).toBe(expected);
  });

  it('folds the 128-bit sequence digest for the 64-bit width', () => {
    const values = randomIntegers(11, 5);
    for (let n = 0; n <= values.length; n++) {
      const seq = values.slice(0, n);
      expect(hashSequence64(seq)).toBe(fold128To64(hashSequence128(seq)));
      expect(hash64(seq)).toBe(fold128To64(hash128(seq)));
    }
  });

  it('distinguishes permutations', () => {
    const left = randomIntegers(1, 2000);
    const right = randomIntegers(2, 2000);
    let collisions = 0;
    for (let i = 0; i < left.length; i++) {
      const a = left[i];
      const b = right[i];
      if (!a || !b || a.digest128() === b.digest128()) continue;
      if (hash128([a, b]) === hash128([b, a])) collisions++;
    }
    expect(collisions).toBe(0);
  });

  it('distinguishes repeated elements by length', () => {
    for (const a of randomIntegers(3, 500)) {
      expect(hash128([a])).not.toBe(hash128([a, a]));
    }
  });

  it('propagates element digest failures', () => {
    const broken: OpaqueValue = {
      digest64: () => {
        throw new Error('digest64 failed');
      },
      digest128: () => {
        throw new Error('digest128 failed');
      }
    };
    expect(() => hash128([FlexValue.integer(1), broken])).toThrow('digest128 failed');
    expect(() => hash64([broken])).toThrow('digest128 failed');
    expect(() => hash64(broken)).toThrow('digest64 failed');
  });

  it('tells sequences from single values', () => {
    expect(isSequence([])).toBe(true);
    expect(isSequence(FlexValue.list([]))).toBe(false);
  });
});
