import { ConfigError } from './errors';
import { BASE32_ALPHABET, DifficultyStats } from './types';

/**
 * Upper-cases a vanity prefix and checks that every character can appear in
 * a base32 encoded key. Throws ConfigError otherwise.
 */
export function normalizeVanityPrefix(raw: string): string {
  const prefix = raw.toUpperCase();

  for (const c of prefix) {
    if (!BASE32_ALPHABET.includes(c)) {
      throw new ConfigError(`Can not generate base32 encoded strings to match '${prefix}'`);
    }
  }

  return prefix;
}

/**
 * True when the public key, minus its leading type character, starts with
 * the prefix.
 */
export function matchesVanity(publicKey: string, prefix: string): boolean {
  return publicKey.slice(1).startsWith(prefix);
}

export function calculateDifficulty(prefix: string): DifficultyStats {
  const effectiveLength = prefix.length;
  const alphabetSize = BASE32_ALPHABET.length;
  const expectedAttempts = Math.pow(alphabetSize, effectiveLength);
  const p50Attempts = expectedAttempts * 0.693; // ln(2)

  return {
    effectiveLength,
    alphabetSize,
    expectedAttempts,
    p50Attempts,
  };
}
