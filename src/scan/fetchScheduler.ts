/**
 * Fetch Scheduler
 *
 * Pulls Candidates from a lazy stream into a bounded worker pool. A permit is
 * taken before the next Candidate is pulled, so at most `concurrency`
 * Candidates are ever in flight and the stream is never read ahead.
 * Candidates derived from responses (linked JS assets) queue ahead of the
 * seed stream and share the same permits.
 *
 * Hash-route Candidates differ only in their fragment, so for `sharedPaths`
 * one fetch per URL serves them all; the copies carry `requests: 0`.
 */

import { Semaphore } from 'async-mutex';
import type { Candidate, FetchResult } from '../core/types.js';
import { createModuleLogger } from '../core/logger.js';
import { fetchCandidate, stripFragment, DEFAULT_FETCH_POLICY, type FetchPolicy } from '../net/fetchCandidate.js';
import type { HttpTransport } from '../net/httpClient.js';

const log = createModuleLogger('fetchScheduler');

const SHARED_RESULT_LIMIT = 64;

/**
 * Receives every FetchResult as soon as it exists; may return follow-up Candidates
 */
export type ResultHandler = (
  candidate: Candidate,
  result: FetchResult
) => Promise<readonly Candidate[] | void> | readonly Candidate[] | void;

export interface FetchSchedulerOptions {
  concurrency: number;
  transport: HttpTransport;
  policy?: FetchPolicy;
  /** Stops admission and aborts in-flight requests */
  signal?: AbortSignal;
  /** Paths, fragment removed, whose fetch is shared by every Candidate on the same URL */
  sharedPaths?: ReadonlySet<string>;
}

export interface SchedulerReport {
  processed: number;
  derived: number;
  peakInFlight: number;
  /** Candidates served from an earlier fetch of the same URL */
  sharedFetches: number;
  aborted: boolean;
}

export class FetchScheduler {
  readonly concurrency: number;
  private readonly semaphore: Semaphore;
  private readonly transport: HttpTransport;
  private readonly policy: FetchPolicy;
  private readonly signal?: AbortSignal;
  private readonly derivedQueue: Candidate[] = [];
  private readonly derivedSeen = new Set<string>();
  private readonly sharedPaths: ReadonlySet<string>;
  private readonly sharedResults = new Map<string, Promise<FetchResult>>();
  private sharedFetches = 0;
  private inFlight = 0;
  private peakInFlight = 0;
  private processed = 0;

  constructor(options: FetchSchedulerOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.concurrency = options.concurrency;
    this.semaphore = new Semaphore(options.concurrency);
    this.transport = options.transport;
    this.policy = options.policy ?? DEFAULT_FETCH_POLICY;
    this.signal = options.signal;
    this.sharedPaths = options.sharedPaths ?? new Set();
  }

  /**
   * Queue follow-up Candidates; each URL is admitted once per scheduler
   */
  enqueue(candidates: Iterable<Candidate>): number {
    let added = 0;
    for (const candidate of candidates) {
      if (this.derivedSeen.has(candidate.url)) continue;
      this.derivedSeen.add(candidate.url);
      this.derivedQueue.push(candidate);
      added++;
    }
    return added;
  }

  /**
   * Fetch every Candidate once. Resolves after all admitted work has drained;
   * rejects with the first handler error after the drain.
   */
  async run(candidates: Iterable<Candidate>, onResult: ResultHandler): Promise<SchedulerReport> {
    const iterator = candidates[Symbol.iterator]();
    const tasks = new Set<Promise<void>>();
    let seedExhausted = false;
    let failed = false;
    let failure: unknown;

    const nextCandidate = (): Candidate | undefined => {
      const derived = this.derivedQueue.shift();
      if (derived) return derived;
      if (seedExhausted) return undefined;
      const step = iterator.next();
      if (step.done) {
        seedExhausted = true;
        return undefined;
      }
      return step.value;
    };

    const halted = (): boolean => failed || this.signal?.aborted === true;

    try {
      while (!halted()) {
        const [, release] = await this.semaphore.acquire();
        if (halted()) {
          release();
          break;
        }

        const candidate = nextCandidate();
        if (!candidate) {
          release();
          if (tasks.size === 0) break;
          // a running task may still derive more candidates
          await Promise.race(tasks);
          continue;
        }

        const task: Promise<void> = this.process(candidate, onResult)
          .catch((error: unknown) => {
            if (!failed) {
              failed = true;
              failure = error;
              log.error({ err: error, url: candidate.url }, 'Result handler failed, halting admission');
            }
          })
          .finally(() => {
            release();
            tasks.delete(task);
          });
        tasks.add(task);
      }
    } finally {
      await Promise.all(tasks);
    }

    if (failed) throw failure;

    const aborted = this.signal?.aborted === true;
    if (aborted) {
      log.warn({ processed: this.processed, pending: this.derivedQueue.length }, 'Run interrupted, in-flight work drained');
    }

    return {
      processed: this.processed,
      derived: this.derivedSeen.size,
      peakInFlight: this.peakInFlight,
      sharedFetches: this.sharedFetches,
      aborted,
    };
  }

  private fetch(candidate: Candidate): Promise<FetchResult> {
    if (!this.sharedPaths.has(stripFragment(candidate.path))) {
      return fetchCandidate(candidate, this.transport, this.policy, this.signal);
    }

    const key = stripFragment(candidate.url);
    const earlier = this.sharedResults.get(key);
    if (earlier) {
      this.sharedFetches++;
      return earlier.then((result) => ({ ...result, requests: 0, schemeFallback: false, elapsedMs: 0 }));
    }

    const pending = fetchCandidate(candidate, this.transport, this.policy, this.signal);
    this.sharedResults.set(key, pending);
    if (this.sharedResults.size > SHARED_RESULT_LIMIT) {
      const oldest = this.sharedResults.keys().next();
      if (!oldest.done) this.sharedResults.delete(oldest.value);
    }
    return pending;
  }

  private async process(candidate: Candidate, onResult: ResultHandler): Promise<void> {
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);

    let result: FetchResult;
    try {
      result = await this.fetch(candidate);
    } finally {
      this.inFlight--;
    }
    this.processed++;

    log.debug(
      { url: result.url, status: result.status, error: result.error, elapsedMs: result.elapsedMs },
      'Fetched candidate'
    );

    const followUps = await onResult(candidate, result);
    if (followUps && followUps.length > 0 && !this.signal?.aborted) {
      this.enqueue(followUps);
    }
  }
}
