// Seed envelope and encoding check for nkeys. nkeys.js decodes seeds and
// public keys itself but has no public entry point for building a seed from
// caller-supplied entropy, or for a bare checksum test of an encoded line.
import { crc16xmodem } from 'crc';
import { Prefix } from 'nkeys.js';
import { base32 } from 'rfc4648';
import { BASE32_ALPHABET, SEED_LENGTH } from './types';

const CHECKSUM_LENGTH = 2;

function checksum(data: Uint8Array): number {
  return crc16xmodem(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
}

/**
 * Encodes 32 bytes of raw entropy as an nkeys seed for the given key type.
 *
 * Layout: seed prefix byte merged with the 5-bit type prefix over two bytes,
 * the raw bytes, then a little-endian CRC-16/XMODEM of everything before it,
 * all in unpadded base32.
 */
export function encodeSeed(prefix: Prefix, raw: Uint8Array): Uint8Array {
  if (raw.length !== SEED_LENGTH) {
    throw new RangeError(`seed must be ${SEED_LENGTH} bytes, got ${raw.length}`);
  }

  const buf = new Uint8Array(2 + SEED_LENGTH + CHECKSUM_LENGTH);
  buf[0] = Prefix.Seed | (prefix >> 5);
  buf[1] = (prefix & 31) << 3;
  buf.set(raw, 2);

  const crc = checksum(buf.subarray(0, 2 + SEED_LENGTH));
  buf[2 + SEED_LENGTH] = crc & 0xff;
  buf[3 + SEED_LENGTH] = (crc >> 8) & 0xff;

  const encoded = base32.stringify(buf, { pad: false });
  buf.fill(0);
  return new TextEncoder().encode(encoded);
}

// Unpadded only: a line carrying '=' is not an encoded key
function decodeBase32(text: string): Uint8Array {
  for (const c of text) {
    if (!BASE32_ALPHABET.includes(c)) {
      throw new SyntaxError(`illegal base32 character ${JSON.stringify(c)}`);
    }
  }
  const remainder = text.length % 8;
  const padded = remainder === 0 ? text : text + '='.repeat(8 - remainder);
  return base32.parse(padded);
}

/**
 * Syntactic check of an encoded key (seed, public or private): valid
 * unpadded base32 whose trailing two bytes are the checksum of the rest.
 */
export function isValidEncoding(line: Uint8Array): boolean {
  if (line.length === 0) return false;

  let raw: Uint8Array;
  try {
    raw = decodeBase32(Buffer.from(line.buffer, line.byteOffset, line.byteLength).toString('latin1'));
  } catch {
    return false;
  }

  try {
    if (raw.length < 4) return false;
    const body = raw.subarray(0, raw.length - CHECKSUM_LENGTH);
    const expected = raw[raw.length - 2] | (raw[raw.length - 1] << 8);
    return checksum(body) === expected;
  } finally {
    raw.fill(0);
  }
}
