// cityhash.ts
// CityHash v1.1 (64 and 128 bit variants) over bigint words.
// All intermediate words are kept in [0, 2^64) by masking after every
// addition and multiplication.

/** Mask for 64-bit wrap-around arithmetic. */
const MASK64 = (1n << 64n) - 1n;

const K0 = 0xc3a5c85c97cb3127n;
const K1 = 0xb492b66fbe98f273n;
const K2 = 0x9ae16a3b2f90404fn;
/** Multiplier used by Hash128to64. */
const K_MUL = 0x9ddfea08eb382d69n;

/** Unsigned 128-bit value split into its two 64-bit halves. */
type Pair = [low: bigint, high: bigint];

const add = (a: bigint, b: bigint): bigint => (a + b) & MASK64;
const mul = (a: bigint, b: bigint): bigint => (a * b) & MASK64;

function rotate(value: bigint, shift: number): bigint {
  if (shift === 0) return value;
  const s = BigInt(shift);
  return ((value >> s) | (value << (64n - s))) & MASK64;
}

function shiftMix(value: bigint): bigint {
  return value ^ (value >> 47n);
}

function bswap64(value: bigint): bigint {
  let out = 0n;
  let v = value;
  for (let i = 0; i < 8; i++) {
    out = (out << 8n) | (v & 0xffn);
    v >>= 8n;
  }
  return out;
}

function fetch64(bytes: Uint8Array, offset: number): bigint {
  let out = 0n;
  for (let i = 7; i >= 0; i--) {
    out = (out << 8n) | BigInt(bytes[offset + i] ?? 0);
  }
  return out;
}

function fetch32(bytes: Uint8Array, offset: number): bigint {
  let out = 0n;
  for (let i = 3; i >= 0; i--) {
    out = (out << 8n) | BigInt(bytes[offset + i] ?? 0);
  }
  return out;
}

function byteAt(bytes: Uint8Array, offset: number): bigint {
  return BigInt(bytes[offset] ?? 0);
}

function hashLen16Mul(u: bigint, v: bigint, m: bigint): bigint {
  let a = mul(u ^ v, m);
  a ^= a >> 47n;
  let b = mul(v ^ a, m);
  b ^= b >> 47n;
  return mul(b, m);
}

/**
 * Reduce a 128-bit value (given as halves) to 64 bits.
 * @param low - Low 64 bits.
 * @param high - High 64 bits.
 * @returns 64-bit digest.
 */
export function hash128To64(low: bigint, high: bigint): bigint {
  return hashLen16Mul(low, high, K_MUL);
}

function hashLen16(u: bigint, v: bigint): bigint {
  return hash128To64(u, v);
}

function hashLen0to16(s: Uint8Array, start: number, len: number): bigint {
  const n = BigInt(len);
  if (len >= 8) {
    const m = add(K2, n * 2n);
    const a = add(fetch64(s, start), K2);
    const b = fetch64(s, start + len - 8);
    const c = add(mul(rotate(b, 37), m), a);
    const d = mul(add(rotate(a, 25), b), m);
    return hashLen16Mul(c, d, m);
  }
  if (len >= 4) {
    const m = add(K2, n * 2n);
    const a = fetch32(s, start);
    return hashLen16Mul(add(n, a << 3n), fetch32(s, start + len - 4), m);
  }
  if (len > 0) {
    const a = byteAt(s, start);
    const b = byteAt(s, start + (len >> 1));
    const c = byteAt(s, start + len - 1);
    const y = (a + (b << 8n)) & 0xffffffffn;
    const z = (n + (c << 2n)) & 0xffffffffn;
    return mul(shiftMix(mul(y, K2) ^ mul(z, K0)), K2);
  }
  return K2;
}

function hashLen17to32(s: Uint8Array, start: number, len: number): bigint {
  const m = add(K2, BigInt(len) * 2n);
  const a = mul(fetch64(s, start), K1);
  const b = fetch64(s, start + 8);
  const c = mul(fetch64(s, start + len - 8), m);
  const d = mul(fetch64(s, start + len - 16), K2);
  return hashLen16Mul(
    add(add(rotate(add(a, b), 43), rotate(c, 30)), d),
    add(add(a, rotate(add(b, K2), 18)), c),
    m
  );
}

function weakHashLen32WithSeedsWords(
  w: bigint,
  x: bigint,
  y: bigint,
  z: bigint,
  seedA: bigint,
  seedB: bigint
): Pair {
  let a = add(seedA, w);
  let b = rotate(add(add(seedB, a), z), 21);
  const c = a;
  a = add(a, x);
  a = add(a, y);
  b = add(b, rotate(a, 44));
  return [add(a, z), add(b, c)];
}

function weakHashLen32WithSeeds(s: Uint8Array, offset: number, a: bigint, b: bigint): Pair {
  return weakHashLen32WithSeedsWords(
    fetch64(s, offset),
    fetch64(s, offset + 8),
    fetch64(s, offset + 16),
    fetch64(s, offset + 24),
    a,
    b
  );
}

function hashLen33to64(s: Uint8Array, start: number, len: number): bigint {
  const m = add(K2, BigInt(len) * 2n);
  let a = mul(fetch64(s, start), K2);
  let b = fetch64(s, start + 8);
  const c = fetch64(s, start + len - 24);
  const d = fetch64(s, start + len - 32);
  const e = mul(fetch64(s, start + 16), K2);
  const f = mul(fetch64(s, start + 24), 9n);
  const g = fetch64(s, start + len - 8);
  const h = mul(fetch64(s, start + len - 16), m);
  const u = add(rotate(add(a, g), 43), mul(add(rotate(b, 30), c), 9n));
  const v = add(add(add(a, g) ^ d, f), 1n);
  const w = add(bswap64(mul(add(u, v), m)), h);
  const x = add(rotate(add(e, f), 42), c);
  const y = mul(add(bswap64(mul(add(v, w), m)), g), m);
  const z = add(add(e, f), c);
  a = add(bswap64(add(mul(add(x, z), m), y)), b);
  b = mul(shiftMix(add(add(mul(add(z, a), m), d), h)), m);
  return add(b, x);
}

/**
 * CityHash64 of a byte buffer.
 * @param bytes - Input bytes.
 * @returns Unsigned 64-bit digest.
 */
export function cityHash64(bytes: Uint8Array): bigint {
  const s = bytes;
  let len = s.length;
  if (len <= 32) {
    return len <= 16 ? hashLen0to16(s, 0, len) : hashLen17to32(s, 0, len);
  }
  if (len <= 64) return hashLen33to64(s, 0, len);

  const n = BigInt(len);
  let x = fetch64(s, len - 40);
  let y = add(fetch64(s, len - 16), fetch64(s, len - 56));
  let z = hashLen16(add(fetch64(s, len - 48), n), fetch64(s, len - 24));
  let v = weakHashLen32WithSeeds(s, len - 64, n, z);
  let w = weakHashLen32WithSeeds(s, len - 32, add(y, K1), x);
  x = add(mul(x, K1), fetch64(s, 0));

  len = (len - 1) & ~63;
  let pos = 0;
  do {
    x = mul(rotate(add(add(add(x, y), v[0]), fetch64(s, pos + 8)), 37), K1);
    y = mul(rotate(add(add(y, v[1]), fetch64(s, pos + 48)), 42), K1);
    x ^= w[1];
    y = add(y, add(v[0], fetch64(s, pos + 40)));
    z = mul(rotate(add(z, w[0]), 33), K1);
    v = weakHashLen32WithSeeds(s, pos, mul(v[1], K1), add(x, w[0]));
    w = weakHashLen32WithSeeds(s, pos + 32, add(z, w[1]), add(y, fetch64(s, pos + 16)));
    [z, x] = [x, z];
    pos += 64;
    len -= 64;
  } while (len !== 0);

  return hashLen16(
    add(add(hashLen16(v[0], w[0]), mul(shiftMix(y), K1)), z),
    add(hashLen16(v[1], w[1]), x)
  );
}

function cityMurmur(s: Uint8Array, start: number, len: number, seed: Pair): Pair {
  let [a, b] = seed;
  let c: bigint;
  let d: bigint;
  let l = len - 16;
  if (l <= 0) {
    a = mul(shiftMix(mul(a, K1)), K1);
    c = add(mul(b, K1), hashLen0to16(s, start, len));
    d = shiftMix(add(a, len >= 8 ? fetch64(s, start) : c));
  } else {
    c = hashLen16(add(fetch64(s, start + len - 8), K1), a);
    d = hashLen16(add(b, BigInt(len)), add(c, fetch64(s, start + len - 16)));
    a = add(a, d);
    let pos = start;
    do {
      a ^= mul(shiftMix(mul(fetch64(s, pos), K1)), K1);
      a = mul(a, K1);
      b ^= a;
      c ^= mul(shiftMix(mul(fetch64(s, pos + 8), K1)), K1);
      c = mul(c, K1);
      d ^= c;
      pos += 16;
      l -= 16;
    } while (l > 0);
  }
  a = hashLen16(a, c);
  b = hashLen16(d, b);
  return [a ^ b, hashLen16(b, a)];
}

function cityHash128WithSeedAt(s: Uint8Array, start: number, length: number, seed: Pair): Pair {
  let len = length;
  if (len < 128) return cityMurmur(s, start, len, seed);

  let [x, y] = seed;
  let z = mul(BigInt(len), K1);
  let v: Pair = [0n, 0n];
  let w: Pair = [0n, 0n];
  v[0] = add(mul(rotate(y ^ K1, 49), K1), fetch64(s, start));
  v[1] = add(mul(rotate(v[0], 42), K1), fetch64(s, start + 8));
  w[0] = add(mul(rotate(add(y, z), 35), K1), x);
  w[1] = mul(rotate(add(x, fetch64(s, start + 88)), 53), K1);

  let pos = start;
  do {
    for (let round = 0; round < 2; round++) {
      x = mul(rotate(add(add(add(x, y), v[0]), fetch64(s, pos + 8)), 37), K1);
      y = mul(rotate(add(add(y, v[1]), fetch64(s, pos + 48)), 42), K1);
      x ^= w[1];
      y = add(y, add(v[0], fetch64(s, pos + 40)));
      z = mul(rotate(add(z, w[0]), 33), K1);
      v = weakHashLen32WithSeeds(s, pos, mul(v[1], K1), add(x, w[0]));
      w = weakHashLen32WithSeeds(s, pos + 32, add(z, w[1]), add(y, fetch64(s, pos + 16)));
      [z, x] = [x, z];
      pos += 64;
    }
    len -= 128;
  } while (len >= 128);

  x = add(x, mul(rotate(add(v[0], z), 49), K0));
  y = add(mul(y, K0), rotate(w[1], 37));
  z = add(mul(z, K0), rotate(w[0], 27));
  w[0] = mul(w[0], 9n);
  v[0] = mul(v[0], K0);

  // Hash up to four 32-byte chunks from the end.
  for (let tailDone = 0; tailDone < len; ) {
    tailDone += 32;
    y = add(mul(rotate(add(x, y), 42), K0), v[1]);
    w[0] = add(w[0], fetch64(s, pos + len - tailDone + 16));
    x = add(mul(x, K0), w[0]);
    z = add(z, add(w[1], fetch64(s, pos + len - tailDone)));
    w[1] = add(w[1], v[0]);
    v = weakHashLen32WithSeeds(s, pos + len - tailDone, add(v[0], z), v[1]);
    v[0] = mul(v[0], K0);
  }

  x = hashLen16(x, v[0]);
  y = hashLen16(add(y, z), w[0]);
  return [
    add(hashLen16(add(x, v[1]), w[1]), y),
    hashLen16(add(x, w[1]), add(y, v[1]))
  ];
}

function joinPair([low, high]: Pair): bigint {
  return (high << 64n) | low;
}

/**
 * CityHash128WithSeed of a byte buffer.
 * @param bytes - Input bytes.
 * @param seed - Unsigned 128-bit seed.
 * @returns Unsigned 128-bit digest (high half in the upper 64 bits).
 */
export function cityHash128WithSeed(bytes: Uint8Array, seed: bigint): bigint {
  const pair: Pair = [seed & MASK64, (seed >> 64n) & MASK64];
  return joinPair(cityHash128WithSeedAt(bytes, 0, bytes.length, pair));
}

/**
 * CityHash128 of a byte buffer.
 * @param bytes - Input bytes.
 * @returns Unsigned 128-bit digest (high half in the upper 64 bits).
 */
export function cityHash128(bytes: Uint8Array): bigint {
  const len = bytes.length;
  if (len >= 16) {
    const seed: Pair = [fetch64(bytes, 0), add(fetch64(bytes, 8), K0)];
    return joinPair(cityHash128WithSeedAt(bytes, 16, len - 16, seed));
  }
  return joinPair(cityHash128WithSeedAt(bytes, 0, len, [K0, K1]));
}
