// sampler.ts
// Deterministic "keep this item with probability p" decisions driven by
// 64-bit digests.

import { proportionCutoff } from './cutoff.ts';
import { toHex64, type Digest64 } from './digest.ts';
import { hash64, isSequence, type Sequence } from './hashing.ts';
import type { Logger } from './logger.ts';
import { FlexValue, type OpaqueValue } from './value.ts';

export interface SamplerOptions {
  proportion: number;
  /** Salt mixed into every key; samplers with different seeds pick different items. */
  seed?: number;
}

/** Anything a sampler can key on. */
export type SampleKey = OpaqueValue | Sequence;

export interface Sampler {
  readonly proportion: number;
  readonly seed: number | undefined;
  readonly cutoff: Digest64;
  /** Digest compared against the cutoff for this key. */
  digestOf(key: SampleKey): Digest64;
  accepts(key: SampleKey): boolean;
  /** Convenience for plain data; see {@link FlexValue.from}. */
  acceptsJson(input: unknown): boolean;
  filter<T>(items: Iterable<T>, keyOf: (item: T) => SampleKey): T[];
}

export function createSampler(options: SamplerOptions, logger?: Logger): Sampler {
  const { proportion, seed } = options;
  const cutoff = proportionCutoff(proportion);
  const salt = seed === undefined ? null : FlexValue.integer(seed);
  logger?.debug('sampler', `proportion=${proportion} cutoff=0x${toHex64(cutoff)}`);

  const digestOf = (key: SampleKey): Digest64 => {
    if (!salt) return hash64(key);
    const value = isSequence(key) ? FlexValue.list(key) : key;
    return hash64([salt, value]);
  };
  const accepts = (key: SampleKey): boolean => digestOf(key) < cutoff;

  function filter<T>(items: Iterable<T>, keyOf: (item: T) => SampleKey): T[] {
    const kept: T[] = [];
    for (const item of items) {
      if (accepts(keyOf(item))) kept.push(item);
    }
    return kept;
  }

  return {
    proportion,
    seed,
    cutoff,
    digestOf,
    accepts,
    acceptsJson: (input) => accepts(FlexValue.from(input)),
    filter
  };
}
