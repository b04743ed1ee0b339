// value.ts
// Dynamically typed value model. Every value exposes 64 and 128 bit
// digests that cover its type tag and its full content.

import { cityHash128WithSeed } from './cityhash.ts';
import {
  combine128,
  fold128To64,
  toLittleEndian,
  uint128,
  type Digest128,
  type Digest64
} from './digest.ts';
import { UnsupportedValueError } from './errors.ts';

/** Anything that can report its own digests. */
export interface OpaqueValue {
  digest64(): Digest64;
  digest128(): Digest128;
}

/** Tagged payload of a FlexValue. */
export type FlexData =
  | { kind: 'undefined' }
  | { kind: 'integer'; value: bigint }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'vector'; value: Float64Array }
  | { kind: 'list'; value: readonly OpaqueValue[] }
  | { kind: 'dict'; value: readonly DictEntry[] };

export type FlexKind = FlexData['kind'];

/** Key/value pair of a dict value, in insertion order. */
export type DictEntry = readonly [key: OpaqueValue, value: OpaqueValue];

/** Type tags mixed into every digest seed. */
const KIND_TAGS: Record<FlexKind, bigint> = {
  undefined: 0n,
  integer: 1n,
  float: 2n,
  string: 3n,
  vector: 4n,
  list: 5n,
  dict: 6n
};

/** High half of every kind seed (golden ratio constant). */
const SEED_HIGH = 0x9e3779b97f4a7c15n;

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;

/** Bit pattern every NaN is hashed as. */
const CANONICAL_NAN = 0x7ff8000000000000n;

const utf8 = new TextEncoder();

function kindSeed(kind: FlexKind): Digest128 {
  return uint128(KIND_TAGS[kind], SEED_HIGH);
}

function writeFloat(view: DataView, offset: number, value: number): void {
  if (Number.isNaN(value)) {
    view.setBigUint64(offset, CANONICAL_NAN, true);
    return;
  }
  // -0 and 0 hash alike.
  view.setFloat64(offset, value === 0 ? 0 : value, true);
}

function floatBytes(values: ArrayLike<number>): Uint8Array {
  const out = new Uint8Array(values.length * 8);
  const view = new DataView(out.buffer);
  for (let i = 0; i < values.length; i++) {
    writeFloat(view, i * 8, values[i] ?? 0);
  }
  return out;
}

function payloadDigest(data: FlexData): Digest128 {
  const seed = kindSeed(data.kind);
  switch (data.kind) {
    case 'undefined':
      return cityHash128WithSeed(new Uint8Array(0), seed);
    case 'integer':
      return cityHash128WithSeed(toLittleEndian(BigInt.asUintN(64, data.value), 8), seed);
    case 'float':
      return cityHash128WithSeed(floatBytes([data.value]), seed);
    case 'string':
      return cityHash128WithSeed(utf8.encode(data.value), seed);
    case 'vector':
      return cityHash128WithSeed(floatBytes(data.value), seed);
    case 'list': {
      let h = cityHash128WithSeed(toLittleEndian(BigInt(data.value.length), 8), seed);
      for (const item of data.value) h = combine128(h, item.digest128());
      return h;
    }
    case 'dict': {
      let h = cityHash128WithSeed(toLittleEndian(BigInt(data.value.length), 8), seed);
      for (const [key, value] of data.value) {
        h = combine128(combine128(h, key.digest128()), value.digest128());
      }
      return h;
    }
  }
}

function isPlainObject(input: object): input is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

/**
 * Immutable dynamically typed value.
 *
 * Construct with the static factories, or convert plain data with
 * {@link FlexValue.from}.
 */
export class FlexValue implements OpaqueValue {
  readonly data: FlexData;

  private constructor(data: FlexData) {
    this.data = data;
  }

  get kind(): FlexKind {
    return this.data.kind;
  }

  static undefined(): FlexValue {
    return new FlexValue({ kind: 'undefined' });
  }

  /**
   * Signed 64-bit integer.
   * @throws UnsupportedValueError when the value is not an integer in the int64 range.
   */
  static integer(value: number | bigint): FlexValue {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) {
      throw new UnsupportedValueError(`integer value must be a safe integer (got ${value})`);
    }
    const big = BigInt(value);
    if (big < INT64_MIN || big > INT64_MAX) {
      throw new UnsupportedValueError(`integer value ${big} is outside the signed 64-bit range`);
    }
    return new FlexValue({ kind: 'integer', value: big });
  }

  static float(value: number): FlexValue {
    return new FlexValue({ kind: 'float', value });
  }

  static string(value: string): FlexValue {
    return new FlexValue({ kind: 'string', value });
  }

  /** Numeric vector; the input is copied. */
  static vector(values: ArrayLike<number>): FlexValue {
    return new FlexValue({ kind: 'vector', value: Float64Array.from(values) });
  }

  static list(items: readonly OpaqueValue[]): FlexValue {
    return new FlexValue({ kind: 'list', value: [...items] });
  }

  static dict(entries: Iterable<DictEntry>): FlexValue {
    return new FlexValue({ kind: 'dict', value: [...entries] });
  }

  /**
   * Convert plain JavaScript data into a FlexValue.
   *
   * null and undefined map to `undefined`, booleans to integers 0/1, safe
   * integers and int64-range bigints to `integer`, other numbers to `float`,
   * Float64Array to `vector`, arrays to `list`, and Maps or plain objects to
   * `dict`.
   * @throws UnsupportedValueError for anything else, or for cyclic input.
   */
  static from(input: unknown): FlexValue {
    return convert(input, new Set<object>());
  }

  digest128(): Digest128 {
    return payloadDigest(this.data);
  }

  digest64(): Digest64 {
    return fold128To64(this.digest128());
  }
}

function convertContainer(input: object, seen: Set<object>): FlexValue {
  if (input instanceof Float64Array) return FlexValue.vector(input);
  if (seen.has(input)) {
    throw new UnsupportedValueError('cannot convert cyclic data');
  }
  seen.add(input);
  let out: FlexValue;
  if (Array.isArray(input)) {
    const items: unknown[] = input;
    out = FlexValue.list(items.map((item) => convert(item, seen)));
  } else if (input instanceof Map) {
    const entries: DictEntry[] = [];
    for (const [key, value] of input) {
      entries.push([convert(key, seen), convert(value, seen)]);
    }
    out = FlexValue.dict(entries);
  } else if (isPlainObject(input)) {
    out = FlexValue.dict(
      Object.entries(input).map(([key, value]): DictEntry => [
        FlexValue.string(key),
        convert(value, seen)
      ])
    );
  } else {
    const name = input.constructor?.name ?? 'object';
    throw new UnsupportedValueError(`cannot convert ${name} to a FlexValue`);
  }
  seen.delete(input);
  return out;
}

function convert(input: unknown, seen: Set<object>): FlexValue {
  if (input instanceof FlexValue) return input;
  if (input === null || input === undefined) return FlexValue.undefined();
  switch (typeof input) {
    case 'boolean':
      return FlexValue.integer(input ? 1 : 0);
    case 'bigint':
      return FlexValue.integer(input);
    case 'number':
      return Number.isSafeInteger(input) ? FlexValue.integer(input) : FlexValue.float(input);
    case 'string':
      return FlexValue.string(input);
    case 'object':
      return convertContainer(input, seen);
    default:
      throw new UnsupportedValueError(`cannot convert ${typeof input} to a FlexValue`);
  }
}
