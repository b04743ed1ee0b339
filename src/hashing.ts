// hashing.ts
// Digests for single values and for ordered sequences of values.

import { combine128, fold128To64, type Digest128, type Digest64 } from './digest.ts';
import { FlexValue, type OpaqueValue } from './value.ts';

/** Ordered, finite list of values. Order and length are part of the digest. */
export type Sequence = readonly OpaqueValue[];

export function isSequence(input: OpaqueValue | Sequence): input is Sequence {
  return Array.isArray(input);
}

/** 128-bit digest of one value; the value's own digest is authoritative. */
export function hashValue128(value: OpaqueValue): Digest128 {
  return value.digest128();
}

/** 64-bit digest of one value. */
export function hashValue64(value: OpaqueValue): Digest64 {
  return value.digest64();
}

/**
 * 128-bit digest of a sequence: seeded with the digest of its length as an
 * integer value, then each element's digest folded in order.
 * The empty sequence hashes exactly like the integer 0.
 */
export function hashSequence128(values: Sequence): Digest128 {
  let h = hashValue128(FlexValue.integer(values.length));
  for (const value of values) {
    h = combine128(h, value.digest128());
  }
  return h;
}

/** 64-bit digest of a sequence, folded from {@link hashSequence128}. */
export function hashSequence64(values: Sequence): Digest64 {
  return fold128To64(hashSequence128(values));
}

export function hash128(value: OpaqueValue): Digest128;
export function hash128(values: Sequence): Digest128;
export function hash128(input: OpaqueValue | Sequence): Digest128;
export function hash128(input: OpaqueValue | Sequence): Digest128 {
  return isSequence(input) ? hashSequence128(input) : hashValue128(input);
}

export function hash64(value: OpaqueValue): Digest64;
export function hash64(values: Sequence): Digest64;
export function hash64(input: OpaqueValue | Sequence): Digest64;
export function hash64(input: OpaqueValue | Sequence): Digest64 {
  return isSequence(input) ? hashSequence64(input) : hashValue64(input);
}
