import { createEntropySource } from './entropy';
import { ConfigError, CryptoError, errorMessage, VerificationError } from './errors';
import { generateKeyPair, loadPublicKey, loadSeed, seedOf } from './keypair';
import { readKey, wipe } from './secret-reader';
import { KeyHandle, KeyTypeName, ProgressReporter, SeedKeyHandle } from './types';
import { createSearchJob, DEFAULT_MAX_ATTEMPTS, VanityGrinder } from './vanity-grinder';

export interface GenerateOptions {
  keyType: KeyTypeName;
  /** Vanity prefix; empty or absent means a plain keypair. */
  prefix?: string;
  maxAttempts?: number;
  /** Entropy file or device; defaults to the CSPRNG. */
  entropyPath?: string;
  workers?: number;
  progress?: ProgressReporter;
}

export interface GeneratedKey {
  seed: string;
  publicKey: string;
  attempts: number;
  elapsedMs: number;
}

export async function generate(options: GenerateOptions): Promise<GeneratedKey> {
  const entropy = createEntropySource(options.entropyPath);
  const started = Date.now();

  if (!options.prefix) {
    const keyPair = await generateKeyPair(options.keyType, entropy);
    return {
      seed: seedOf(keyPair),
      publicKey: keyPair.getPublicKey(),
      attempts: 1,
      elapsedMs: Date.now() - started,
    };
  }

  const job = createSearchJob(
    options.keyType,
    options.prefix,
    options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    entropy
  );
  const grinder = new VanityGrinder(job, {
    workers: options.workers,
    progress: options.progress,
  });
  const found = await grinder.search();
  return {
    seed: seedOf(found.keyPair),
    publicKey: found.publicKey,
    attempts: found.attempts,
    elapsedMs: found.elapsedMs,
  };
}

/** Loads a seed key out of secret file contents; `contents` is wiped. */
export function seedKeyFrom(contents: Uint8Array): SeedKeyHandle {
  return loadSeed(readKey(contents));
}

export function publicKeyFrom(contents: Uint8Array): KeyHandle {
  return loadPublicKey(readKey(contents));
}

export function showPublic(seedContents: Uint8Array): string {
  return seedKeyFrom(seedContents).keyPair.getPublicKey();
}

export function signWith(key: SeedKeyHandle, content: Uint8Array): string {
  return Buffer.from(key.keyPair.sign(content)).toString('base64');
}

export function sign(content: Uint8Array, seedContents?: Uint8Array): string {
  if (!seedContents) {
    throw new ConfigError('Sign requires a seed/private key via -inkey <file>');
  }
  return signWith(seedKeyFrom(seedContents), content);
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeSignature(signature: string): Uint8Array {
  const text = signature.trim();
  if (text.length % 4 !== 0 || !BASE64.test(text)) {
    throw new CryptoError('illegal base64 data in signature');
  }
  return Buffer.from(text, 'base64');
}

export function verifyWith(key: KeyHandle, content: Uint8Array, signature: Uint8Array): void {
  let ok: boolean;
  try {
    ok = key.keyPair.verify(content, signature);
  } catch (error) {
    // tweetnacl rejects signatures of the wrong size by throwing
    throw new CryptoError(errorMessage(error), { cause: error });
  }
  if (!ok) {
    throw new VerificationError();
  }
}

export interface VerifyKeys {
  seed?: Uint8Array;
  publicKey?: Uint8Array;
}

function verifierFrom(keys: VerifyKeys): KeyHandle {
  if (keys.seed) return seedKeyFrom(keys.seed);
  if (keys.publicKey) return publicKeyFrom(keys.publicKey);
  throw new ConfigError('Verify requires a seed key via -inkey or a public key via -pubin');
}

/**
 * Checks a base64 signature with the seed key if one is given, otherwise
 * the public key. Throws VerificationError when it does not match.
 */
export function verify(content: Uint8Array, keys: VerifyKeys, signature?: string): void {
  if (!signature) {
    if (keys.seed) wipe(keys.seed);
    throw new ConfigError('Verify requires a signature via -sig');
  }
  const key = verifierFrom(keys);
  verifyWith(key, content, decodeSignature(signature));
}
