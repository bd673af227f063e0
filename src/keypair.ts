import { fromPublic, fromSeed, Prefix } from 'nkeys.js';
import type { KeyPair } from 'nkeys.js';
import { encodeSeed } from './codec';
import { ConfigError, CryptoError, EntropyError, errorMessage } from './errors';
import { EntropySource, KEY_TYPE_NAMES, KeyHandle, KeyTypeName, SEED_LENGTH, SeedKeyHandle } from './types';

const PREFIXES: Record<KeyTypeName, Prefix> = {
  user: Prefix.User,
  account: Prefix.Account,
  server: Prefix.Server,
  cluster: Prefix.Cluster,
  operator: Prefix.Operator,
};

function isKeyTypeName(value: string): value is KeyTypeName {
  return (KEY_TYPE_NAMES as readonly string[]).includes(value);
}

export function parseKeyType(name: string): KeyTypeName {
  const normalized = name.toLowerCase();
  if (!isKeyTypeName(normalized)) {
    throw new ConfigError(`Usage: nk -gen [${KEY_TYPE_NAMES.join('|')}]`);
  }
  return normalized;
}

export function prefixForType(keyType: KeyTypeName): Prefix {
  return PREFIXES[keyType];
}

/**
 * Builds a keypair of the given type from 32 bytes read from the entropy
 * source. The raw entropy is zeroed once it is encoded; the encoded seed
 * belongs to the returned keypair.
 */
export async function generateKeyPair(
  keyType: KeyTypeName,
  entropy: EntropySource
): Promise<KeyPair> {
  const raw = await entropy.read();
  if (raw.length !== SEED_LENGTH) {
    raw.fill(0);
    throw new EntropyError(
      `Error reading from ${entropy.name}: expected ${SEED_LENGTH} bytes, got ${raw.length}`
    );
  }

  try {
    return fromSeed(encodeSeed(prefixForType(keyType), raw));
  } catch (error) {
    throw new CryptoError(`Error creating ${keyType} key: ${errorMessage(error)}`, { cause: error });
  } finally {
    raw.fill(0);
  }
}

export function loadSeed(seed: Uint8Array): SeedKeyHandle {
  try {
    return { kind: 'seed', keyPair: fromSeed(seed) };
  } catch (error) {
    throw new CryptoError(errorMessage(error), { cause: error });
  }
}

export function loadPublicKey(publicKey: Uint8Array): KeyHandle {
  try {
    return { kind: 'public', keyPair: fromPublic(new TextDecoder().decode(publicKey)) };
  } catch (error) {
    throw new CryptoError(errorMessage(error), { cause: error });
  }
}

export function seedOf(keyPair: KeyPair): string {
  return new TextDecoder().decode(keyPair.getSeed());
}
