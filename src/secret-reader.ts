import { isValidEncoding } from './codec';
import { KeyNotFoundError } from './errors';

const NEWLINE = 0x0a;
export const WIPE_BYTE = 'x'.charCodeAt(0);

export type EncodingCheck = (line: Uint8Array) => boolean;

/** Best-effort scrub; does not reach copies made elsewhere by the runtime. */
export function wipe(buf: Uint8Array): void {
  buf.fill(WIPE_BYTE);
}

function* lines(contents: Uint8Array): Generator<Uint8Array> {
  let start = 0;
  for (let i = 0; i < contents.length; i++) {
    if (contents[i] === NEWLINE) {
      yield contents.subarray(start, i);
      start = i + 1;
    }
  }
  yield contents.subarray(start);
}

/**
 * Returns a copy of the first line of `contents` that is a validly encoded
 * key. `contents` is wiped before returning, whether or not a key was found.
 */
export function readKey(contents: Uint8Array, isValid: EncodingCheck = isValidEncoding): Uint8Array {
  try {
    for (const line of lines(contents)) {
      if (isValid(line)) {
        // Buffer#slice would alias the input; copy into fresh storage.
        return new Uint8Array(line);
      }
    }
    throw new KeyNotFoundError();
  } finally {
    wipe(contents);
  }
}
