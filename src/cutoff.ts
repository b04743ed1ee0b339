import type { Digest64 } from './digest.ts';
import { PreconditionViolation } from './errors.ts';

function assertProportion(proportion: number): void {
  if (Number.isNaN(proportion)) {
    throw new PreconditionViolation('proportion', 'nan', Number.NaN, proportion);
  }
  if (proportion < 0) {
    throw new PreconditionViolation('proportion', 'lower', 0, proportion);
  }
  if (proportion > 1) {
    throw new PreconditionViolation('proportion', 'upper', 1, proportion);
  }
}

/**
 * Threshold for using a 64-bit digest as a uniform random source:
 *
 *   if (hash64(item) < proportionCutoff(p)) { ... }  // true for a fraction p of items
 *
 * Scaling straight to 2^64 would lose the low bits to double rounding, so
 * the proportion is scaled to half the range and the two halves are added
 * back with each one clipped to its own headroom. 1 maps to exactly 2^64 - 1.
 * @throws PreconditionViolation when proportion is NaN or outside [0, 1].
 */
export function proportionCutoff(proportion: number): Digest64 {
  assertProportion(proportion);

  const half = 1n << 63n;
  const max = (1n << 64n) - 1n;

  const xHalf = BigInt(Math.floor(proportion * 2 ** 63));
  const clip0 = half;
  const clip1 = max - half;

  return (xHalf < clip0 ? xHalf : clip0) + (xHalf < clip1 ? xHalf : clip1);
}
