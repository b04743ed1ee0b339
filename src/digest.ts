import { cityHash128WithSeed, hash128To64 } from './cityhash.ts';

/** Unsigned 64-bit digest in [0, 2^64). */
export type Digest64 = bigint;
/** Unsigned 128-bit digest in [0, 2^128). */
export type Digest128 = bigint;

/** Largest Digest64. */
export const MAX_UINT64: Digest64 = (1n << 64n) - 1n;
/** Largest Digest128. */
export const MAX_UINT128: Digest128 = (1n << 128n) - 1n;

/**
 * Assemble a 128-bit value from its halves.
 * @param low - Low 64 bits.
 * @param high - High 64 bits.
 * @returns Combined 128-bit value.
 */
export function uint128(low: bigint, high: bigint): Digest128 {
  return ((high & MAX_UINT64) << 64n) | (low & MAX_UINT64);
}

export function low64(value: Digest128): Digest64 {
  return value & MAX_UINT64;
}

export function high64(value: Digest128): Digest64 {
  return (value >> 64n) & MAX_UINT64;
}

/**
 * Write an unsigned integer as little-endian bytes.
 * @param value - Value to encode; bits beyond `byteLength * 8` are dropped.
 * @param byteLength - Output width in bytes.
 * @returns Encoded bytes.
 */
export function toLittleEndian(value: bigint, byteLength: number): Uint8Array {
  const out = new Uint8Array(byteLength);
  let v = value;
  for (let i = 0; i < byteLength; i++) {
    out[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return out;
}

/**
 * Fold a 128-bit digest down to 64 bits. This is the only 128 to 64 bit
 * reduction in the library: value digests and sequence digests both use it.
 */
export function fold128To64(value: Digest128): Digest64 {
  return hash128To64(low64(value), high64(value));
}

/**
 * Mix a running digest with the next digest. Order matters:
 * `combine128(a, b)` and `combine128(b, a)` differ for distinct inputs.
 * @param running - Digest accumulated so far, used as the seed.
 * @param next - Digest being folded in.
 * @returns Updated running digest.
 */
export function combine128(running: Digest128, next: Digest128): Digest128 {
  return cityHash128WithSeed(toLittleEndian(next, 16), running);
}

export function toHex64(value: Digest64): string {
  return (value & MAX_UINT64).toString(16).padStart(16, '0');
}

export function toHex128(value: Digest128): string {
  return (value & MAX_UINT128).toString(16).padStart(32, '0');
}
