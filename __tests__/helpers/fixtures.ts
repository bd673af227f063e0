import { EntropySource } from '../../src/types';

/** Same 32 bytes on every read; a fresh copy each time since reads get wiped. */
export class FixedEntropy implements EntropySource {
  readonly name = 'fixed';

  constructor(private readonly bytes: Uint8Array) {}

  async read(): Promise<Uint8Array> {
    return new Uint8Array(this.bytes);
  }
}

export function fixedBytes(value: number, length = 32): Uint8Array {
  return new Uint8Array(length).fill(value);
}

export function flipBit(data: Uint8Array, bit: number): Uint8Array {
  const copy = new Uint8Array(data);
  copy[Math.floor(bit / 8)] ^= 1 << bit % 8;
  return copy;
}
