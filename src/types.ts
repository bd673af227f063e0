import type { KeyPair } from 'nkeys.js';

export type KeyTypeName = 'user' | 'account' | 'server' | 'cluster' | 'operator';

export const KEY_TYPE_NAMES: readonly KeyTypeName[] = [
  'user',
  'account',
  'server',
  'cluster',
  'operator',
];

/**
 * A loaded key, tagged by what it can do. Seed keys sign and verify;
 * public keys only verify.
 */
export type KeyHandle =
  | { kind: 'seed'; keyPair: KeyPair }
  | { kind: 'public'; keyPair: KeyPair };

export type SeedKeyHandle = Extract<KeyHandle, { kind: 'seed' }>;

export interface EntropySource {
  /** Human-readable origin, used in error messages. */
  readonly name: string;
  read(): Promise<Uint8Array>;
}

export interface SearchJob {
  readonly keyType: KeyTypeName;
  /** Upper-cased vanity prefix, already checked against the base32 alphabet. */
  readonly prefix: string;
  readonly entropy?: EntropySource;
  readonly maxAttempts: number;
}

export interface VanityResult {
  keyPair: KeyPair;
  publicKey: string;
  attempts: number;
  elapsedMs: number;
}

export interface GrinderStats {
  attempts: number;
  rate: number;
  elapsedMs: number;
}

export interface ProgressReporter {
  tick(attempt: number): void;
  clear(): void;
}

export interface DifficultyStats {
  effectiveLength: number;
  alphabetSize: number;
  expectedAttempts: number;
  p50Attempts: number;
}

export const SEED_LENGTH = 32;

// RFC 4648 base32, the alphabet encoded keys are written in
export const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';
