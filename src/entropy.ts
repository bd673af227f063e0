import { randomBytes } from 'crypto';
import { open } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { promisify } from 'util';
import { EntropyError, errorMessage } from './errors';
import { EntropySource, SEED_LENGTH } from './types';

const randomBytesAsync = promisify(randomBytes);

export class RandomEntropySource implements EntropySource {
  readonly name = 'crypto.randomBytes';

  async read(): Promise<Uint8Array> {
    return randomBytesAsync(SEED_LENGTH);
  }
}

/**
 * Reads the first 32 bytes of a file or device on every call. A regular
 * file therefore yields the same seed each time; /dev/urandom does not.
 */
export class FileEntropySource implements EntropySource {
  readonly name: string;

  constructor(private readonly path: string) {
    this.name = path;
  }

  async read(): Promise<Uint8Array> {
    let handle: FileHandle;
    try {
      handle = await open(this.path, 'r');
    } catch (error) {
      throw new EntropyError(`Error reading from ${this.name}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      const seed = new Uint8Array(SEED_LENGTH);
      let filled = 0;
      while (filled < SEED_LENGTH) {
        const { bytesRead } = await handle.read(seed, filled, SEED_LENGTH - filled, null);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
      if (filled < SEED_LENGTH) {
        seed.fill(0);
        throw new EntropyError(
          `Error reading from ${this.name}: expected ${SEED_LENGTH} bytes, got ${filled}`
        );
      }
      return seed;
    } finally {
      await handle.close();
    }
  }
}

export function createEntropySource(path?: string): EntropySource {
  return path ? new FileEntropySource(path) : new RandomEntropySource();
}
