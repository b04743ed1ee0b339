import fs from 'node:fs';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SamplingConfig {
  /** Fraction of items to accept, in [0, 1]. */
  proportion: number;
  /** Optional salt so separate samplers draw independent samples. */
  seed?: number;
  logLevel: LogLevel;
}

/** Unvalidated config fields as read from TOML, env or argv. */
export type RawSamplingConfig = { [K in keyof SamplingConfig]?: unknown };

export const DEFAULT_CONFIG: SamplingConfig = {
  proportion: 1,
  logLevel: 'info'
};

type Env = Record<string, string | undefined>;
type Warn = (msg: string) => void;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function getArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === flag) {
      return argv[i + 1];
    }
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
  }
  return undefined;
}

/** Parse a raw numeric setting; blank or non-numeric input gives NaN. */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim()) return Number(value.trim());
  return Number.NaN;
}

/**
 * Coerce a raw proportion. Unparseable input falls back to the default; a
 * finite number outside [0, 1] is kept so the cutoff rejects it loudly.
 */
function coerceProportion(value: unknown, fallback: number, warn?: Warn): number {
  if (value === undefined || value === null) return fallback;
  const parsed = toNumber(value);
  if (!Number.isFinite(parsed)) {
    warn?.(`proportion is invalid; using ${fallback}.`);
    return fallback;
  }
  return parsed;
}

function coerceSeed(value: unknown, warn?: Warn): number | undefined {
  if (value === undefined || value === null) return undefined;
  const parsed = Math.floor(toNumber(value));
  if (!Number.isSafeInteger(parsed)) {
    warn?.('seed is invalid; ignoring.');
    return undefined;
  }
  return parsed;
}

export function normalizeConfig(input: RawSamplingConfig, warn?: Warn): SamplingConfig {
  const proportion = coerceProportion(input.proportion, DEFAULT_CONFIG.proportion, warn);

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel !== undefined) {
    warn?.(`logLevel "${String(input.logLevel)}" is invalid; using ${logLevel}.`);
  }

  const output: SamplingConfig = { proportion, logLevel };
  const seed = coerceSeed(input.seed, warn);
  if (seed !== undefined) output.seed = seed;
  return output;
}

/**
 * Load sampling settings from a TOML file.
 * @param filePath - TOML path to read.
 * @param warn - Receives read and parse problems.
 * @returns Raw settings, or an empty object when the file is missing, unreadable, empty or invalid.
 */
export function loadConfigFile(filePath: string, warn?: Warn): RawSamplingConfig {
  if (!fs.existsSync(filePath)) return {};
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn?.(`failed to read ${filePath}: ${message}`);
    return {};
  }
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn?.(`failed to parse ${filePath}: ${message}`);
    return {};
  }
  if (!parsed || typeof parsed !== 'object') return {};
  const table: Record<string, unknown> = { ...parsed };
  const output: RawSamplingConfig = {};
  if ('proportion' in table) output.proportion = table['proportion'];
  if ('seed' in table) output.seed = table['seed'];
  if ('logLevel' in table) output.logLevel = table['logLevel'];
  return output;
}

/**
 * Resolve settings with precedence argv > env > TOML file > defaults.
 * The file comes from `--config` or `SAMPLING_CONFIG`, relative to the cwd.
 */
export function parseConfig(
  argv: string[],
  env: Env,
  warn: Warn = (msg) => console.warn(`[config] ${msg}`)
): SamplingConfig {
  const configPath = getArgValue(argv, '--config') ?? env['SAMPLING_CONFIG'];
  const input: RawSamplingConfig = configPath
    ? loadConfigFile(path.resolve(process.cwd(), configPath), warn)
    : {};
  const proportion = getArgValue(argv, '--proportion') ?? env['SAMPLE_PROPORTION'];
  if (proportion !== undefined) input.proportion = proportion;
  const seed = getArgValue(argv, '--seed') ?? env['SAMPLE_SEED'];
  if (seed !== undefined) input.seed = seed;
  const logLevel = getArgValue(argv, '--log') ?? env['LOG_LEVEL'];
  if (logLevel) input.logLevel = logLevel;
  return normalizeConfig(input, warn);
}
