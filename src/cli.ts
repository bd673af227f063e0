#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { BENCHMARK_ATTEMPTS, formatDuration, printDifficultyEstimate, runBenchmark } from './benchmark';
import { ConfigError, errorMessage } from './errors';
import { parseKeyType } from './keypair';
import { generate, showPublic, sign, verify, VerifyKeys } from './operations';
import { normalizeVanityPrefix } from './pattern';
import { SpinnerProgress } from './progress';
import { DEFAULT_MAX_ATTEMPTS } from './vanity-grinder';

// Rough single-process generation rate, for the -verbose estimate only
const ESTIMATED_RATE = 10_000;

export interface Io {
  out(line: string): void;
  err(line: string): void;
  /** Raw stderr writes for the progress line. */
  write(chunk: string): void;
  readFile(file: string): Promise<Buffer>;
}

export const defaultIo: Io = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  write: (chunk) => {
    process.stderr.write(chunk);
  },
  readFile: (file) => fs.promises.readFile(file),
};

export interface CliOptions {
  help: boolean;
  version: boolean;
  gen?: string;
  pre?: string;
  maxpre?: number;
  entropy?: string;
  inkey?: string;
  pubin?: string;
  sign?: string;
  verify?: string;
  sig?: string;
  pubout: boolean;
  verbose: boolean;
  bench: boolean;
}

type BooleanFlag = 'help' | 'version' | 'pubout' | 'verbose' | 'bench';
type StringFlag = 'gen' | 'pre' | 'entropy' | 'inkey' | 'pubin' | 'sign' | 'verify' | 'sig';

const BOOLEAN_FLAGS = new Map<string, BooleanFlag>([
  ['h', 'help'],
  ['help', 'help'],
  ['v', 'version'],
  ['pubout', 'pubout'],
  ['verbose', 'verbose'],
  ['bench', 'bench'],
]);

const STRING_FLAGS = new Map<string, StringFlag>([
  ['gen', 'gen'],
  ['pre', 'pre'],
  ['e', 'entropy'],
  ['inkey', 'inkey'],
  ['pubin', 'pubin'],
  ['sign', 'sign'],
  ['verify', 'verify'],
  ['sig', 'sig'],
]);

export const USAGE =
  'Usage: nk [-v] [-gen type] [-sign file] [-verify file] [-inkey file] [-pubin file] ' +
  '[-sig file] [-pubout] [-e entropy] [-pre vanity] [-maxpre n] [-verbose] [-bench]';

function printUsage(log: (line: string) => void): void {
  log(USAGE);
  log('\nOptions:');
  log('  -gen <type>      Generate key for user|account|server|cluster|operator');
  log('  -pre <prefix>    Search for a public key starting with <prefix> (base32: A-Z, 2-7)');
  log(`  -maxpre <n>      Maximum attempts at the vanity prefix (default ${DEFAULT_MAX_ATTEMPTS})`);
  log('  -e <file>        Read 32 bytes of entropy from <file>, e.g. /dev/urandom');
  log('  -pubout          Output the public key');
  log('  -inkey <file>    Input key (seed/private key)');
  log('  -pubin <file>    Input public key');
  log('  -sign <file>     Sign <file> with -inkey <file>');
  log('  -verify <file>   Verify <file> with -inkey or -pubin and -sig <file>');
  log('  -sig <file>      Base64 signature');
  log('  -verbose         Print difficulty estimate and search statistics');
  log('  -bench           Measure key generation rate for -gen type (default user) over');
  log(`                   -maxpre attempts (default ${BENCHMARK_ATTEMPTS})`);
  log('  -v               Show version');
}

function parseBoolean(flag: string, value: string): boolean {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ConfigError(`invalid boolean value "${value}" for -${flag}`);
}

/** Flags take one or two dashes, as `-flag value` or `-flag=value`. */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    help: false,
    version: false,
    pubout: false,
    verbose: false,
    bench: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('-') || arg === '-' || arg === '--') {
      throw new ConfigError(`unexpected argument: ${arg}`);
    }

    const body = arg.replace(/^--?/, '');
    const eq = body.indexOf('=');
    const name = eq === -1 ? body : body.slice(0, eq);
    const inline = eq === -1 ? undefined : body.slice(eq + 1);

    const booleanFlag = BOOLEAN_FLAGS.get(name);
    if (booleanFlag) {
      options[booleanFlag] = inline === undefined ? true : parseBoolean(name, inline);
      continue;
    }

    const stringFlag = STRING_FLAGS.get(name);
    if (!stringFlag && name !== 'maxpre') {
      throw new ConfigError(`flag provided but not defined: -${name}`);
    }

    let value = inline;
    if (value === undefined) {
      if (i + 1 >= args.length) {
        throw new ConfigError(`flag needs an argument: -${name}`);
      }
      value = args[++i];
    }

    if (stringFlag) {
      options[stringFlag] = value;
    } else {
      const max = Number(value);
      if (value.trim() === '' || !Number.isInteger(max)) {
        throw new ConfigError(`invalid value "${value}" for flag -maxpre`);
      }
      options.maxpre = max;
    }
  }

  return options;
}

async function readInput(io: Io, file: string, what: string): Promise<Buffer> {
  try {
    return await io.readFile(file);
  } catch (error) {
    throw new ConfigError(`Could not read ${what} ${file}: ${errorMessage(error)}`, { cause: error });
  }
}

export function readVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8')
  );
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
    const { version } = manifest;
    if (typeof version === 'string') return version;
  }
  return 'unknown';
}

async function generateCommand(options: CliOptions, io: Io): Promise<void> {
  const keyType = parseKeyType(options.gen ?? 'user');
  const prefix = options.pre ? normalizeVanityPrefix(options.pre) : '';

  if (prefix && options.verbose) {
    printDifficultyEstimate(prefix, ESTIMATED_RATE, io.err);
  }

  const key = await generate({
    keyType,
    prefix,
    maxAttempts: options.maxpre ?? DEFAULT_MAX_ATTEMPTS,
    entropyPath: options.entropy,
    progress: new SpinnerProgress(io.write),
  });

  if (prefix && options.verbose) {
    io.err(`Found after ${key.attempts.toLocaleString()} attempts in ${formatDuration(key.elapsedMs / 1000)}`);
  }

  io.out(key.seed);
  if (options.pubout || prefix) {
    io.out(key.publicKey);
  }
}

/** Runs one invocation and returns the process exit code. */
export async function run(args: string[], io: Io = defaultIo): Promise<number> {
  try {
    const options = parseArgs(args);

    if (options.help) {
      printUsage(io.out);
      return 0;
    }

    if (options.version) {
      io.out(`nk version ${readVersion()}`);
    }

    if (options.bench) {
      await runBenchmark(parseKeyType(options.gen ?? 'user'), {
        attempts: options.maxpre,
        log: io.out,
      });
      return 0;
    }

    if (options.gen !== undefined) {
      await generateCommand(options, io);
      return 0;
    }

    if (options.entropy !== undefined) {
      throw new ConfigError('Entropy file only used when creating keys with -gen');
    }

    if (options.sign !== undefined) {
      const content = await readInput(io, options.sign, 'content');
      const seed = options.inkey ? await readInput(io, options.inkey, 'key') : undefined;
      io.out(sign(content, seed));
      return 0;
    }

    if (options.verify !== undefined) {
      const content = await readInput(io, options.verify, 'content');
      const signature = options.sig ? (await readInput(io, options.sig, 'signature')).toString('utf-8') : undefined;
      const keys: VerifyKeys = {};
      // Keys are only read once there is a signature to check
      if (signature) {
        keys.publicKey = options.pubin ? await readInput(io, options.pubin, 'public key') : undefined;
        keys.seed = options.inkey ? await readInput(io, options.inkey, 'key') : undefined;
      }
      verify(content, keys, signature);
      io.out('Verified OK');
      return 0;
    }

    if (options.inkey && options.pubout) {
      io.out(showPublic(await readInput(io, options.inkey, 'key')));
      return 0;
    }

    if (options.version) {
      return 0;
    }

    printUsage(io.err);
    return 1;
  } catch (error) {
    io.err(errorMessage(error));
    return 1;
  }
}

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
}
