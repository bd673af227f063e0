export { Channel, ChannelClosedError } from './channel';
export type { Receipt } from './channel';
export { Completion } from './completion';
export type { Settlement } from './completion';
export { encodeSeed, isValidEncoding } from './codec';
export { createEntropySource, FileEntropySource, RandomEntropySource } from './entropy';
export {
  ConfigError,
  CryptoError,
  EntropyError,
  errorMessage,
  KeyNotFoundError,
  NkError,
  SearchExhaustedError,
  toNkError,
  VerificationError,
} from './errors';
export { generateKeyPair, loadPublicKey, loadSeed, parseKeyType, prefixForType, seedOf } from './keypair';
export {
  decodeSignature,
  generate,
  publicKeyFrom,
  seedKeyFrom,
  showPublic,
  sign,
  signWith,
  verify,
  verifyWith,
} from './operations';
export type { GeneratedKey, GenerateOptions, VerifyKeys } from './operations';
export { calculateDifficulty, matchesVanity, normalizeVanityPrefix } from './pattern';
export { silentProgress, SpinnerProgress } from './progress';
export { readKey, wipe, WIPE_BYTE } from './secret-reader';
export * from './types';
export { createSearchJob, DEFAULT_MAX_ATTEMPTS, VanityGrinder } from './vanity-grinder';
export type { KeyPairGenerator, VanityGrinderOptions } from './vanity-grinder';
