import { availableParallelism } from 'os';
import type { KeyPair } from 'nkeys.js';
import { Channel } from './channel';
import { Completion } from './completion';
import { RandomEntropySource } from './entropy';
import { ConfigError, SearchExhaustedError } from './errors';
import { generateKeyPair } from './keypair';
import { matchesVanity, normalizeVanityPrefix } from './pattern';
import { silentProgress } from './progress';
import {
  EntropySource,
  GrinderStats,
  KeyTypeName,
  ProgressReporter,
  SearchJob,
  VanityResult,
} from './types';

export const DEFAULT_MAX_ATTEMPTS = 10_000_000;

export type KeyPairGenerator = (keyType: KeyTypeName, entropy: EntropySource) => Promise<KeyPair>;

export interface VanityGrinderOptions {
  /** Pool size; defaults to the number of logical processors. */
  workers?: number;
  progress?: ProgressReporter;
  generate?: KeyPairGenerator;
}

export function createSearchJob(
  keyType: KeyTypeName,
  prefix: string,
  maxAttempts: number = DEFAULT_MAX_ATTEMPTS,
  entropy?: EntropySource
): SearchJob {
  if (!Number.isInteger(maxAttempts)) {
    throw new ConfigError(`Maximum attempts must be an integer, got ${maxAttempts}`);
  }
  return Object.freeze({
    keyType,
    prefix: normalizeVanityPrefix(prefix),
    entropy,
    maxAttempts,
  });
}

/**
 * Searches for a keypair whose public key carries a vanity prefix.
 *
 * A pool of workers waits on an unbuffered work channel. The dispatcher
 * hands out one token per attempt, so each accepted send is exactly one
 * generate-and-test, and at most `maxAttempts` keys are generated however
 * many workers there are. A worker that finds a match settles the shared
 * completion and retires; the dispatcher sees it on its next poll.
 */
export class VanityGrinder {
  private readonly job: SearchJob;
  private readonly entropy: EntropySource;
  private readonly workerCount: number;
  private readonly progress: ProgressReporter;
  private readonly generate: KeyPairGenerator;

  private attempts: number = 0;
  private startTime: number = Date.now();
  private endTime: number | null = null;

  constructor(job: SearchJob, options: VanityGrinderOptions = {}) {
    const workers = options.workers ?? availableParallelism();
    if (!Number.isInteger(workers) || workers < 1) {
      throw new ConfigError(`Worker count must be a positive integer, got ${workers}`);
    }

    this.job = job;
    this.entropy = job.entropy ?? new RandomEntropySource();
    this.workerCount = workers;
    this.progress = options.progress ?? silentProgress;
    this.generate = options.generate ?? generateKeyPair;
  }

  get workers(): number {
    return this.workerCount;
  }

  async search(): Promise<VanityResult> {
    this.attempts = 0;
    this.startTime = Date.now();
    this.endTime = null;

    const work = new Channel<number>();
    const outcome = new Completion<KeyPair>();
    const workers: Promise<void>[] = [];
    for (let i = 0; i < this.workerCount; i++) {
      workers.push(this.runWorker(work, outcome));
    }

    try {
      for (let i = 0; i < this.job.maxAttempts; i++) {
        this.progress.tick(i);
        if (await work.send(i, outcome.signal)) {
          this.attempts++;
        }

        const settled = outcome.peek();
        if (settled.status === 'fulfilled') {
          this.progress.clear();
          return this.toResult(settled.value);
        }
        if (settled.status === 'rejected') {
          this.progress.clear();
          throw settled.reason;
        }
      }

      this.progress.clear();
      throw new SearchExhaustedError(this.attempts);
    } finally {
      work.close();
      await Promise.all(workers);
      this.endTime = Date.now();
    }
  }

  getStats(): GrinderStats {
    const elapsedMs = (this.endTime ?? Date.now()) - this.startTime;
    const elapsedSec = elapsedMs / 1000;
    return {
      attempts: this.attempts,
      rate: elapsedSec > 0 ? this.attempts / elapsedSec : 0,
      elapsedMs,
    };
  }

  private async runWorker(work: Channel<number>, outcome: Completion<KeyPair>): Promise<void> {
    for await (const _attempt of work) {
      let keyPair: KeyPair;
      try {
        keyPair = await this.generate(this.job.keyType, this.entropy);
      } catch (error) {
        outcome.reject(error);
        return;
      }

      if (matchesVanity(keyPair.getPublicKey(), this.job.prefix)) {
        outcome.resolve(keyPair);
        return;
      }
    }
  }

  private toResult(keyPair: KeyPair): VanityResult {
    return {
      keyPair,
      publicKey: keyPair.getPublicKey(),
      attempts: this.attempts,
      elapsedMs: Date.now() - this.startTime,
    };
  }
}
