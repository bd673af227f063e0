export class NkError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NkError';
    this.code = code;
  }
}

// Unknown key type, unencodable vanity prefix, missing input
export class ConfigError extends NkError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG', options);
    this.name = 'ConfigError';
  }
}

export class EntropyError extends NkError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'ENTROPY', options);
    this.name = 'EntropyError';
  }
}

export class SearchExhaustedError extends NkError {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`Failed to generate prefix after ${attempts} attempts`, 'SEARCH_EXHAUSTED');
    this.name = 'SearchExhaustedError';
    this.attempts = attempts;
  }
}

export class KeyNotFoundError extends NkError {
  constructor(message = 'Could not find a valid key') {
    super(message, 'KEY_NOT_FOUND');
    this.name = 'KeyNotFoundError';
  }
}

/** Malformed seed, public key or signature encoding. */
export class CryptoError extends NkError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CRYPTO', options);
    this.name = 'CryptoError';
  }
}

export class VerificationError extends NkError {
  constructor(message = 'nkeys: signature verification failed') {
    super(message, 'VERIFICATION');
    this.name = 'VerificationError';
  }
}

/** Coerce unknown thrown value to NkError (preserves cause chain). */
export function toNkError(value: unknown): NkError {
  if (value instanceof NkError) return value;
  if (value instanceof Error) return new NkError(value.message, 'UNKNOWN', { cause: value });
  return new NkError(String(value ?? 'Unknown error'), 'UNKNOWN');
}

export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return 'Unknown error';
  return String(value);
}
