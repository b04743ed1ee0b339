export {
  cityHash128,
  cityHash128WithSeed,
  cityHash64,
  hash128To64
} from './cityhash.ts';
export {
  DEFAULT_CONFIG,
  loadConfigFile,
  normalizeConfig,
  parseConfig,
  type LogLevel,
  type RawSamplingConfig,
  type SamplingConfig
} from './config.ts';
export { proportionCutoff } from './cutoff.ts';
export {
  MAX_UINT128,
  MAX_UINT64,
  combine128,
  fold128To64,
  high64,
  low64,
  toHex128,
  toHex64,
  uint128,
  type Digest128,
  type Digest64
} from './digest.ts';
export { PreconditionViolation, UnsupportedValueError, type BoundKind } from './errors.ts';
export {
  hash128,
  hash64,
  hashSequence128,
  hashSequence64,
  hashValue128,
  hashValue64,
  isSequence,
  type Sequence
} from './hashing.ts';
export { createLogger, type LogSink, type Logger } from './logger.ts';
export {
  createSampler,
  type SampleKey,
  type Sampler,
  type SamplerOptions
} from './sampler.ts';
export {
  FlexValue,
  type DictEntry,
  type FlexData,
  type FlexKind,
  type OpaqueValue
} from './value.ts';
