import { pathToFileURL } from 'node:url';
import { parseConfig, toNumber } from './config.ts';
import { proportionCutoff } from './cutoff.ts';
import { toHex128, toHex64 } from './digest.ts';
import { hash128, hash64 } from './hashing.ts';
import { createLogger } from './logger.ts';
import { createSampler } from './sampler.ts';
import { FlexValue } from './value.ts';

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

type Env = Record<string, string | undefined>;

const USAGE = [
  'Usage: sampling-hash <command> [options]',
  '',
  'Commands:',
  '  hash64 <json>         64-bit digest of a JSON value (hex)',
  '  hash128 <json>        128-bit digest of a JSON value (hex)',
  '  cutoff [proportion]   64-bit cutoff for a proportion (decimal and hex)',
  '  sample <json-array>   elements of the array kept at --proportion',
  '',
  'Options:',
  '  --proportion <p>      fraction to keep, 0..1 (env SAMPLE_PROPORTION)',
  '  --seed <n>            sampling salt (env SAMPLE_SEED)',
  '  --log <level>         debug | info | warn | error (env LOG_LEVEL)',
  '  --config <file>       TOML settings file (env SAMPLING_CONFIG)'
].join('\n');

/** Flags that consume the following argument when not written as --flag=value. */
const VALUE_FLAGS = new Set(['--proportion', '--seed', '--log', '--config']);

const defaultIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`)
};

function positionals(argv: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (VALUE_FLAGS.has(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('--')) continue;
    out.push(arg);
  }
  return out;
}

function parseJsonArg(raw: string | undefined, what: string): unknown {
  if (raw === undefined) throw new Error(`missing ${what} argument`);
  return JSON.parse(raw);
}

/**
 * Run one CLI command.
 * @returns Process exit code: 0 on success, 1 on failure, 2 on usage errors.
 */
export function runCli(argv: string[], env: Env, io: CliIo = defaultIo): number {
  const warnings: string[] = [];
  const config = parseConfig(argv, env, (msg) => warnings.push(msg));
  const logger = createLogger(config.logLevel, io.stderr);
  for (const msg of warnings) logger.warn('config', msg);

  const [command, ...args] = positionals(argv);
  try {
    switch (command) {
      case 'hash64':
        io.stdout(toHex64(hash64(FlexValue.from(parseJsonArg(args[0], 'json')))));
        return 0;
      case 'hash128':
        io.stdout(toHex128(hash128(FlexValue.from(parseJsonArg(args[0], 'json')))));
        return 0;
      case 'cutoff': {
        const proportion = args[0] === undefined ? config.proportion : toNumber(args[0]);
        const cutoff = proportionCutoff(proportion);
        io.stdout(`${cutoff}\t0x${toHex64(cutoff)}`);
        return 0;
      }
      case 'sample': {
        const items = parseJsonArg(args[0], 'json-array');
        if (!Array.isArray(items)) throw new Error('sample expects a JSON array');
        const sampler = createSampler(config, logger);
        const kept = sampler.filter<unknown>(items, (item) => FlexValue.from(item));
        logger.info('cli', `kept ${kept.length} of ${items.length}`);
        io.stdout(JSON.stringify(kept));
        return 0;
      }
      default:
        io.stderr(USAGE);
        return 2;
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('cli', message);
    return 1;
  }
}

export function main(): void {
  process.exitCode = runCli(process.argv.slice(2), process.env);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main();
}
