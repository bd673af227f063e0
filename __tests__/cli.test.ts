import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Io, parseArgs, readVersion, run, USAGE } from '../src/cli';
import { ConfigError } from '../src/errors';
import { generateKeyPair, loadSeed, seedOf } from '../src/keypair';
import { signWith } from '../src/operations';
import { FixedEntropy, fixedBytes } from './helpers/fixtures';

function memoryIo(files: Record<string, string> = {}): { io: Io; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  const io: Io = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    write: () => {},
    readFile: async (file) => {
      const contents = files[file];
      if (contents === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${file}'`);
      }
      return Buffer.from(contents);
    },
  };
  return { io, out, err };
}

describe('parseArgs', () => {
  test('reads single- and double-dash flags', () => {
    const options = parseArgs(['-gen', 'user', '-pre=abc', '--maxpre', '50', '-pubout']);
    expect(options.gen).toBe('user');
    expect(options.pre).toBe('abc');
    expect(options.maxpre).toBe(50);
    expect(options.pubout).toBe(true);
    expect(options.verbose).toBe(false);
  });

  test('defaults', () => {
    const options = parseArgs([]);
    expect(options.maxpre).toBeUndefined();
    expect(options.gen).toBeUndefined();
    expect(options.pubout).toBe(false);
  });

  test('maps -e to the entropy path and accepts explicit booleans', () => {
    const options = parseArgs(['-e', '/dev/urandom', '-pubout=false', '-v=true']);
    expect(options.entropy).toBe('/dev/urandom');
    expect(options.pubout).toBe(false);
    expect(options.version).toBe(true);
  });

  test('rejects unknown flags, missing values and bad numbers', () => {
    expect(() => parseArgs(['-nope'])).toThrow('flag provided but not defined: -nope');
    expect(() => parseArgs(['-toString', 'x'])).toThrow(ConfigError);
    expect(() => parseArgs(['-gen'])).toThrow('flag needs an argument: -gen');
    expect(() => parseArgs(['-maxpre', 'many'])).toThrow('invalid value "many" for flag -maxpre');
    expect(() => parseArgs(['-pubout=maybe'])).toThrow(ConfigError);
    expect(() => parseArgs(['stray'])).toThrow('unexpected argument: stray');
  });
});

describe('run', () => {
  let seed: string;
  let publicKey: string;

  beforeAll(async () => {
    const kp = await generateKeyPair('user', new FixedEntropy(fixedBytes(33)));
    seed = seedOf(kp);
    publicKey = kp.getPublicKey();
  });

  test('prints usage and fails without a mode', async () => {
    const { io, out, err } = memoryIo();
    expect(await run([], io)).toBe(1);
    expect(err[0]).toBe(USAGE);
    expect(out).toEqual([]);
  });

  test('-h prints usage to stdout', async () => {
    const { io, out } = memoryIo();
    expect(await run(['-h'], io)).toBe(0);
    expect(out[0]).toBe(USAGE);
  });

  test('-v prints the package version', async () => {
    const { io, out } = memoryIo();
    expect(await run(['-v'], io)).toBe(0);
    expect(out).toEqual([`nk version ${readVersion()}`]);
    expect(readVersion()).toBe('0.3.0');
  });

  describe('-gen', () => {
    test('prints a seed of the requested type', async () => {
      const { io, out } = memoryIo();
      expect(await run(['-gen', 'operator'], io)).toBe(0);
      expect(out).toHaveLength(1);
      expect(out[0].slice(0, 2)).toBe('SO');
    });

    test('-pubout adds the public key', async () => {
      const { io, out } = memoryIo();
      expect(await run(['-gen', 'cluster', '-pubout'], io)).toBe(0);
      expect(out).toHaveLength(2);
      expect(out[0].slice(0, 2)).toBe('SC');
      expect(out[1][0]).toBe('C');
    });

    test('-pre searches for a vanity key and prints both keys', async () => {
      const { io, out } = memoryIo();
      expect(await run(['-gen', 'user', '-pre', 'a', '-maxpre', '1000000'], io)).toBe(0);
      expect(out).toHaveLength(2);
      expect(out[1].slice(0, 2)).toBe('UA');
    });

    test('-verbose reports the estimate and the search on stderr', async () => {
      const { io, out, err } = memoryIo();
      expect(await run(['-gen', 'user', '-pre', 'a', '-verbose'], io)).toBe(0);
      expect(err[0]).toBe('Difficulty estimate:');
      expect(err[err.length - 1]).toMatch(/^Found after \S+ attempts in /);
      expect(out).toHaveLength(2);
    });

    test('unencodable prefix fails', async () => {
      const { io, out, err } = memoryIo();
      expect(await run(['-gen', 'user', '-pre', 'zz0'], io)).toBe(1);
      expect(err).toEqual(["Can not generate base32 encoded strings to match 'ZZ0'"]);
      expect(out).toEqual([]);
    });

    test('-verbose does not estimate an unencodable prefix', async () => {
      const { io, out, err } = memoryIo();
      expect(await run(['-gen', 'user', '-pre', 'zz0', '-verbose'], io)).toBe(1);
      expect(err).toEqual(["Can not generate base32 encoded strings to match 'ZZ0'"]);
      expect(out).toEqual([]);
    });

    test('exhausted budget fails with the attempt count', async () => {
      const { io, err } = memoryIo();
      expect(await run(['-gen', 'user', '-pre', 'ZZZZZZZZZZZZ', '-maxpre', '20'], io)).toBe(1);
      expect(err).toEqual(['Failed to generate prefix after 20 attempts']);
    });

    test('unknown type fails', async () => {
      const { io, err } = memoryIo();
      expect(await run(['-gen', 'bogus'], io)).toBe(1);
      expect(err).toEqual(['Usage: nk -gen [user|account|server|cluster|operator]']);
    });

    test('-e reads entropy from a file', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nk-cli-'));
      try {
        const file = path.join(dir, 'entropy.bin');
        fs.writeFileSync(file, Buffer.alloc(32, 33));

        const first = memoryIo();
        const second = memoryIo();
        expect(await run(['-gen', 'user', '-e', file], first.io)).toBe(0);
        expect(await run(['-gen', 'user', '-e', file], second.io)).toBe(0);

        expect(first.out[0]).toBe(second.out[0]);
        expect(first.out[0]).toBe(seed);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  test('-e without -gen fails', async () => {
    const { io, err } = memoryIo();
    expect(await run(['-e', '/dev/urandom'], io)).toBe(1);
    expect(err).toEqual(['Entropy file only used when creating keys with -gen']);
  });

  describe('-sign / -verify', () => {
    const files = (): Record<string, string> => ({
      'key.nk': `${seed}\n`,
      'pub.nk': `${publicKey}\n`,
      'msg.txt': 'hello',
      'other.txt': 'hullo',
    });

    test('signs content with the input key', async () => {
      const { io, out } = memoryIo(files());
      expect(await run(['-sign', 'msg.txt', '-inkey', 'key.nk'], io)).toBe(0);

      const expected = signWith(loadSeed(new TextEncoder().encode(seed)), Buffer.from('hello'));
      expect(out).toEqual([expected]);
    });

    test('verifies with the public key', async () => {
      const signed = memoryIo(files());
      await run(['-sign', 'msg.txt', '-inkey', 'key.nk'], signed.io);

      const { io, out } = memoryIo({ ...files(), 'msg.sig': `${signed.out[0]}\n` });
      expect(await run(['-verify', 'msg.txt', '-pubin', 'pub.nk', '-sig', 'msg.sig'], io)).toBe(0);
      expect(out).toEqual(['Verified OK']);
    });

    test('verifies with the seed key', async () => {
      const signed = memoryIo(files());
      await run(['-sign', 'msg.txt', '-inkey', 'key.nk'], signed.io);

      const { io, out } = memoryIo({ ...files(), 'msg.sig': signed.out[0] });
      expect(await run(['-verify', 'msg.txt', '-inkey', 'key.nk', '-sig', 'msg.sig'], io)).toBe(0);
      expect(out).toEqual(['Verified OK']);
    });

    test('rejects a signature over different content', async () => {
      const signed = memoryIo(files());
      await run(['-sign', 'msg.txt', '-inkey', 'key.nk'], signed.io);

      const { io, out, err } = memoryIo({ ...files(), 'msg.sig': signed.out[0] });
      expect(await run(['-verify', 'other.txt', '-pubin', 'pub.nk', '-sig', 'msg.sig'], io)).toBe(1);
      expect(err).toEqual(['nkeys: signature verification failed']);
      expect(out).toEqual([]);
    });

    test('sign without a key fails', async () => {
      const { io, err } = memoryIo(files());
      expect(await run(['-sign', 'msg.txt'], io)).toBe(1);
      expect(err).toEqual(['Sign requires a seed/private key via -inkey <file>']);
    });

    test('verify without a signature fails', async () => {
      const { io, err } = memoryIo(files());
      expect(await run(['-verify', 'msg.txt', '-pubin', 'pub.nk'], io)).toBe(1);
      expect(err).toEqual(['Verify requires a signature via -sig']);
    });

    test('missing signature is reported before the key is read', async () => {
      const { io, err } = memoryIo({ ...files(), 'bad.nk': 'not a key\n' });
      expect(await run(['-verify', 'msg.txt', '-inkey', 'bad.nk'], io)).toBe(1);
      expect(err).toEqual(['Verify requires a signature via -sig']);
    });

    test('unreadable files are reported', async () => {
      const { io, err } = memoryIo(files());
      expect(await run(['-sign', 'msg.txt', '-inkey', 'missing.nk'], io)).toBe(1);
      expect(err).toEqual([
        "Could not read key missing.nk: ENOENT: no such file or directory, open 'missing.nk'",
      ]);
    });

    test('key file without a valid key fails', async () => {
      const { io, err } = memoryIo({ ...files(), 'bad.nk': 'hello\n' });
      expect(await run(['-sign', 'msg.txt', '-inkey', 'bad.nk'], io)).toBe(1);
      expect(err).toEqual(['Could not find a valid key']);
    });
  });

  test('-inkey with -pubout prints the public key', async () => {
    const { io, out } = memoryIo({ 'key.nk': `# user seed\n${seed}\n` });
    expect(await run(['-inkey', 'key.nk', '-pubout'], io)).toBe(0);
    expect(out).toEqual([publicKey]);
  });

  test('-bench reports a rate', async () => {
    const { io, out } = memoryIo();
    expect(await run(['-bench', '-gen', 'account', '-maxpre', '200'], io)).toBe(0);
    expect(out[0]).toBe('Benchmarking account key generation (200 attempts)...');
    expect(out[1]).toMatch(/^ {2}\d+\.\d{2} k\/s over /);
  });
});
