/**
 * Execute Run - orchestrates one enumeration run
 *
 * input file → normalize → lazy candidate stream → scheduler → pipeline → store
 */

import { readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { nanoid } from 'nanoid';
import { Errors } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';
import { output, scanner } from '../core/env.js';
import { ResultStore } from '../core/resultStore.js';
import { isPositiveInteger } from '../core/validation.js';
import { RunStats, type RunStatsSnapshot } from '../core/runStats.js';
import type { Discovery, JsMiningMode } from '../core/types.js';
import { getDefaultCatalog, hashRouteBases, type DiscoveryCatalog } from '../config/catalog.js';
import { createDefaultRegistry } from '../modules/classifier.js';
import type { EvaluationBudget } from '../modules/jsMiner/index.js';
import { createHttpTransport, type HttpTransport } from '../net/httpClient.js';
import { DEFAULT_FETCH_POLICY, type FetchPolicy } from '../net/fetchCandidate.js';
import { candidateStream } from '../util/candidateExpander.js';
import { normalizeTargets } from '../util/targetNormalizer.js';
import { DiscoveryPipeline } from './discoveryPipeline.js';
import { FetchScheduler } from './fetchScheduler.js';

const log = createModuleLogger('executeRun');

export interface RunOptions {
  inputPath: string;
  /** Defaults to env-enum.txt beside the input file */
  outputPath?: string;
  jsMode?: JsMiningMode;
  concurrency?: number;
  catalog?: DiscoveryCatalog;
  /** Caller-owned; only a transport built here is closed at the end */
  transport?: HttpTransport;
  policy?: Partial<FetchPolicy>;
  evaluationBudget?: EvaluationBudget;
  maxAssetsPerPage?: number;
  /** Appended after the built-in scanners */
  extraScanners?: readonly unknown[];
  signal?: AbortSignal;
  /** Called with every committed output line */
  onDiscovery?: (line: string, discovery: Discovery) => void;
}

export interface RunSummary {
  runId: string;
  status: 'completed' | 'interrupted';
  outputPath: string;
  targets: number;
  rejectedTargets: number;
  duration: number;
  stats: RunStatsSnapshot;
}

export function defaultOutputPath(inputPath: string): string {
  return join(dirname(resolve(inputPath)), output.FILE_NAME);
}

async function readTargets(inputPath: string): Promise<string[]> {
  try {
    const text = await readFile(inputPath, 'utf8');
    return text.split(/\r?\n/);
  } catch (error) {
    throw Errors.inputUnreadable(inputPath, error);
  }
}

/**
 * Run one enumeration. InputError and OutputIOError reject; everything
 * per-request is counted in the summary.
 */
export async function executeRun(options: RunOptions): Promise<RunSummary> {
  const startTime = Date.now();
  const runId = `run-${nanoid(10)}`;
  const runLog = log.child({ runId });

  const concurrency = options.concurrency ?? scanner.CONCURRENCY;
  if (!isPositiveInteger(concurrency)) {
    throw Errors.invalidNumber('concurrency', 'Must be a positive integer');
  }

  const lines = await readTargets(options.inputPath);
  const { targets, rejected } = normalizeTargets(lines);
  const catalog = options.catalog ?? getDefaultCatalog();
  const outputPath = options.outputPath ? resolve(options.outputPath) : defaultOutputPath(options.inputPath);
  const jsMode = options.jsMode ?? 'pattern';

  runLog.info(
    { targets: targets.length, rejected: rejected.length, concurrency, jsMode, outputPath },
    'Starting enumeration run'
  );

  const stats = new RunStats();
  const store = new ResultStore(outputPath, { onCommit: options.onDiscovery });
  const registry = createDefaultRegistry({
    catalog,
    jsMiner: {
      mode: jsMode,
      budget: options.evaluationBudget,
      onFault: () => {
        stats.evaluationFaults++;
      },
    },
    extraScanners: options.extraScanners,
  });

  const ownsTransport = options.transport === undefined;
  const transport =
    options.transport ?? createHttpTransport({ userAgent: scanner.USER_AGENT, tlsVerify: scanner.TLS_VERIFY });
  const scheduler = new FetchScheduler({
    concurrency,
    transport,
    policy: { ...DEFAULT_FETCH_POLICY, ...options.policy },
    signal: options.signal,
    sharedPaths: hashRouteBases(catalog),
  });
  const pipeline = new DiscoveryPipeline({
    registry,
    store,
    stats,
    maxAssetsPerPage: options.maxAssetsPerPage,
  });

  await store.open();
  let aborted = false;
  try {
    const report = await scheduler.run(candidateStream(targets, catalog), pipeline.handle);
    aborted = report.aborted;
    runLog.debug(
      { peakInFlight: report.peakInFlight, derived: report.derived, sharedFetches: report.sharedFetches },
      'Scheduler drained'
    );
  } finally {
    try {
      await store.close();
    } finally {
      if (ownsTransport) await transport.close?.();
    }
  }

  const summary: RunSummary = {
    runId,
    status: aborted ? 'interrupted' : 'completed',
    outputPath,
    targets: targets.length,
    rejectedTargets: rejected.length,
    duration: Date.now() - startTime,
    stats: stats.snapshot(),
  };

  runLog.info(
    {
      status: summary.status,
      duration: summary.duration,
      requests: summary.stats.requests,
      discoveries: summary.stats.discoveries,
      errors: summary.stats.errors,
    },
    '[DONE] Enumeration run finished'
  );

  return summary;
}

export default { executeRun };
