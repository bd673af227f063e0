import { SearchExhaustedError } from './errors';
import { calculateDifficulty } from './pattern';
import { DifficultyStats, KeyTypeName } from './types';
import { createSearchJob, VanityGrinder } from './vanity-grinder';

export const BENCHMARK_ATTEMPTS = 20_000;

// Can never match: longer than the encoded public key
const UNREACHABLE_PREFIX = 'A'.repeat(64);

type Log = (line: string) => void;

export function formatDuration(seconds: number): string {
  if (seconds < 1) {
    return '<1 second';
  } else if (seconds < 60) {
    return `${seconds.toFixed(1)} seconds`;
  } else if (seconds < 3600) {
    return `${(seconds / 60).toFixed(1)} minutes`;
  } else if (seconds < 86400) {
    return `${(seconds / 3600).toFixed(1)} hours`;
  } else if (seconds < 86400 * 365) {
    return `${(seconds / 86400).toFixed(1)} days`;
  } else {
    return `${(seconds / (86400 * 365)).toFixed(1)} years`;
  }
}

export function printDifficultyEstimate(
  prefix: string,
  estimatedRate: number,
  log: Log = console.error
): DifficultyStats {
  const stats = calculateDifficulty(prefix);

  log('Difficulty estimate:');
  log(`  Prefix length: ${stats.effectiveLength} chars`);
  log(`  Alphabet size: ${stats.alphabetSize} (base32)`);
  log(`  Expected attempts (mean): ${stats.expectedAttempts.toFixed(0)}`);
  log(`  P50 attempts (median): ${stats.p50Attempts.toFixed(0)}`);

  const p50Seconds = stats.p50Attempts / estimatedRate;
  log(
    `  Estimated P50 time: ${formatDuration(p50Seconds)} (at ~${(estimatedRate / 1000).toFixed(1)}k keys/sec)`
  );

  return stats;
}

export interface BenchmarkResult {
  keyType: KeyTypeName;
  workers: number;
  attempts: number;
  rate: number; // keys per second
  elapsed: number; // seconds
}

/**
 * Runs the grinder against a prefix that cannot match, so every attempt in
 * the budget is spent, and reports keys per second.
 */
export async function runBenchmark(
  keyType: KeyTypeName,
  options: { attempts?: number; workers?: number; log?: Log } = {}
): Promise<BenchmarkResult> {
  const attempts = options.attempts ?? BENCHMARK_ATTEMPTS;
  const log = options.log ?? console.log;

  const job = createSearchJob(keyType, UNREACHABLE_PREFIX, attempts);
  const grinder = new VanityGrinder(job, { workers: options.workers });

  log(`Benchmarking ${keyType} key generation (${attempts.toLocaleString()} attempts)...`);
  try {
    await grinder.search();
  } catch (error) {
    if (!(error instanceof SearchExhaustedError)) throw error;
  }

  const stats = grinder.getStats();
  const elapsed = stats.elapsedMs / 1000;
  const result: BenchmarkResult = {
    keyType,
    workers: grinder.workers,
    attempts: stats.attempts,
    rate: stats.rate,
    elapsed,
  };
  log(`  ${(stats.rate / 1000).toFixed(2)} k/s over ${formatDuration(elapsed)}`);
  return result;
}
