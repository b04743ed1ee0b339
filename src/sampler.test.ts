import { describe, it, expect } from 'vitest';
import { proportionCutoff } from './cutoff.ts';
import { PreconditionViolation } from './errors.ts';
import { hash64 } from './hashing.ts';
import { createLogger } from './logger.ts';
import { createSampler } from './sampler.ts';
import { FlexValue } from './value.ts';

function integers(count: number): FlexValue[] {
  return Array.from({ length: count }, (_, i) => FlexValue.integer(i));
}

describe('sampler', () => {
  it('derives its cutoff from the proportion', () => {
    const sampler = createSampler({ proportion: 0.3 });
    expect(sampler.cutoff).toBe(proportionCutoff(0.3));
    expect(sampler.proportion).toBe(0.3);
    expect(sampler.seed).toBeUndefined();
  });

  it('compares the key digest strictly against the cutoff', () => {
    const sampler = createSampler({ proportion: 0.5 });
    for (const value of integers(50)) {
      expect(sampler.digestOf(value)).toBe(hash64(value));
      expect(sampler.accepts(value)).toBe(hash64(value) < sampler.cutoff);
    }
  });

  it('accepts nothing at 0 and everything at 1', () => {
    const none = createSampler({ proportion: 0 });
    const all = createSampler({ proportion: 1 });
    for (const value of integers(100)) {
      expect(none.accepts(value)).toBe(false);
      expect(all.accepts(value)).toBe(true);
    }
  });

  it('salts keys with the seed', () => {
    const sampler = createSampler({ proportion: 0.5, seed: 42 });
    const a = FlexValue.integer(1);
    const b = FlexValue.string('b');
    expect(sampler.digestOf(a)).toBe(hash64([FlexValue.integer(42), a]));
    expect(sampler.digestOf([a, b])).toBe(hash64([FlexValue.integer(42), FlexValue.list([a, b])]));
  });

  it('draws different samples for different seeds', () => {
    const items = integers(200);
    const first = createSampler({ proportion: 0.5, seed: 1 }).filter(items, (item) => item);
    const second = createSampler({ proportion: 0.5, seed: 2 }).filter(items, (item) => item);
    expect(first).not.toEqual(second);
  });

  it('filters in input order using the key function', () => {
    const rows = Array.from({ length: 100 }, (_, i) => ({ id: i, label: `row-${i}` }));
    const sampler = createSampler({ proportion: 0.4 });
    const kept = sampler.filter(rows, (row) => FlexValue.integer(row.id));
    expect(kept).toEqual(rows.filter((row) => sampler.accepts(FlexValue.integer(row.id))));
  });

  it('accepts plain data through FlexValue conversion', () => {
    const sampler = createSampler({ proportion: 0.5 });
    for (let i = 0; i < 50; i++) {
      const input = { user: i, region: 'eu' };
      expect(sampler.acceptsJson(input)).toBe(sampler.accepts(FlexValue.from(input)));
    }
  });

  it('keeps roughly the requested share of hashed items', () => {
    const sampler = createSampler({ proportion: 0.3 });
    const kept = sampler.filter(integers(20_000), (item) => item);
    expect(Math.abs(kept.length / 20_000 - 0.3)).toBeLessThan(0.02);
  });

  it('rejects invalid proportions', () => {
    expect(() => createSampler({ proportion: 1.5 })).toThrow(PreconditionViolation);
    expect(() => createSampler({ proportion: -0.1 })).toThrow(PreconditionViolation);
  });

  it('logs the cutoff at debug level', () => {
    const lines: string[] = [];
    const logger = createLogger('debug', (line) => lines.push(line));
    createSampler({ proportion: 0.5 }, logger);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/ \| debug \| sampler \| proportion=0\.5 cutoff=0x8000000000000000$/);
  });
});
