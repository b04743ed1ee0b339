import { describe, it, expect } from 'vitest';
import { proportionCutoff } from './cutoff.ts';
import { MAX_UINT64 } from './digest.ts';
import { PreconditionViolation } from './errors.ts';
import { createWordSource, uniformDigests } from './test/uniformDigests.ts';

describe('proportionCutoff', () => {
  it('maps the boundaries exactly', () => {
    expect(proportionCutoff(0)).toBe(0n);
    expect(proportionCutoff(-0)).toBe(0n);
    expect(proportionCutoff(1)).toBe(MAX_UINT64);
    expect(proportionCutoff(1)).toBe(18446744073709551615n);
  });

  it('maps exact binary fractions exactly', () => {
    expect(proportionCutoff(0.25)).toBe(1n << 62n);
    expect(proportionCutoff(0.5)).toBe(1n << 63n);
    expect(proportionCutoff(0.75)).toBe(3n << 62n);
  });

  it('keeps low bits near the ends of the range', () => {
    expect(proportionCutoff(2 ** -63)).toBe(2n);
    expect(proportionCutoff(Number.MIN_VALUE)).toBe(0n);
    // Largest double below 1.
    expect(proportionCutoff(1 - 2 ** -53)).toBe((1n << 64n) - 2048n);
  });

  it('is monotone in the proportion', () => {
    const next = createWordSource(99);
    const proportions = [0, 1e-18, 1e-10, 0.1, 0.5, 0.9, 1 - 2 ** -53, 1];
    for (let i = 0; i < 1000; i++) proportions.push(next() / 0x100000000);
    proportions.sort((a, b) => a - b);
    let previous = -1n;
    for (const p of proportions) {
      const cutoff = proportionCutoff(p);
      expect(cutoff).toBeGreaterThanOrEqual(previous);
      previous = cutoff;
    }
  });

  it('rejects proportions outside [0, 1] without clamping', () => {
    expect(() => proportionCutoff(-0.1)).toThrow(PreconditionViolation);
    expect(() => proportionCutoff(-0.1)).toThrow('proportion must be >= 0 (got -0.1)');
    expect(() => proportionCutoff(1.1)).toThrow(PreconditionViolation);
    expect(() => proportionCutoff(1.1)).toThrow('proportion must be <= 1 (got 1.1)');
    expect(() => proportionCutoff(Number.NaN)).toThrow('proportion must be a number (got NaN)');
  });

  it('reports the violated bound and value', () => {
    let caught: unknown;
    try {
      proportionCutoff(1.1);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PreconditionViolation);
    if (caught instanceof PreconditionViolation) {
      expect(caught.argument).toBe('proportion');
      expect(caught.bound).toBe('upper');
      expect(caught.limit).toBe(1);
      expect(caught.value).toBe(1.1);
    }
  });

  it(
    'passes the requested fraction of uniform digests',
    () => {
      const digests = uniformDigests(0x5eed, 1_000_000);
      for (const p of [0.1, 0.25, 0.5, 0.9]) {
        const cutoff = proportionCutoff(p);
        let below = 0;
        for (const digest of digests) {
          if (digest < cutoff) below++;
        }
        expect(Math.abs(below / digests.length - p)).toBeLessThan(0.005);
      }
    },
    60_000
  );
});
