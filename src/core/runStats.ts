/**
 * Aggregate run counters, written by the scheduler, pipeline and sink and
 * read by the completion summary.
 */

import { FETCH_ERROR_KINDS, type FetchErrorKind, type FetchResult } from './types.js';

export interface RunStatsSnapshot {
  candidates: number;
  requests: number;
  responses: number;
  errors: Record<FetchErrorKind, number>;
  notFound: number;
  truncated: number;
  schemeFallbacks: number;
  discoveries: number;
  duplicates: number;
  scannerFailures: number;
  evaluationFaults: number;
}

export class RunStats {
  candidates = 0;
  requests = 0;
  responses = 0;
  readonly errors: Record<FetchErrorKind, number> = { NetworkError: 0, Timeout: 0, RedirectLoop: 0 };
  notFound = 0;
  truncated = 0;
  schemeFallbacks = 0;
  discoveries = 0;
  duplicates = 0;
  scannerFailures = 0;
  evaluationFaults = 0;

  /**
   * Count one completed FetchResult
   */
  recordFetch(result: FetchResult): void {
    this.candidates++;
    this.requests += result.requests;
    if (result.schemeFallback) this.schemeFallbacks++;

    if (result.error) {
      this.errors[result.error]++;
      return;
    }

    this.responses++;
    if (result.status === 404) this.notFound++;
    if (result.truncated) this.truncated++;
  }

  get totalErrors(): number {
    return FETCH_ERROR_KINDS.reduce((sum, kind) => sum + this.errors[kind], 0);
  }

  snapshot(): RunStatsSnapshot {
    return {
      candidates: this.candidates,
      requests: this.requests,
      responses: this.responses,
      errors: { ...this.errors },
      notFound: this.notFound,
      truncated: this.truncated,
      schemeFallbacks: this.schemeFallbacks,
      discoveries: this.discoveries,
      duplicates: this.duplicates,
      scannerFailures: this.scannerFailures,
      evaluationFaults: this.evaluationFaults,
    };
  }
}
