/**
 * env-recon public API
 */

export { executeRun, defaultOutputPath, type RunOptions, type RunSummary } from './scan/executeRun.js';
export { FetchScheduler, type FetchSchedulerOptions, type ResultHandler, type SchedulerReport } from './scan/fetchScheduler.js';
export { DiscoveryPipeline, type DiscoveryPipelineOptions } from './scan/discoveryPipeline.js';

export { normalizeTarget, normalizeTargets, type TargetValidationResult } from './util/targetNormalizer.js';
export { expandTarget, candidateStream, permuteHosts, applyTemplate, maxCandidatesPerTarget } from './util/candidateExpander.js';
export { loadCatalog, getDefaultCatalog, knownHashRoutes, hashRouteBases, type DiscoveryCatalog } from './config/catalog.js';

export { createHttpTransport, TransportError, type HttpTransport, type HttpResponse } from './net/httpClient.js';
export { fetchCandidate, DEFAULT_FETCH_POLICY, type FetchPolicy } from './net/fetchCandidate.js';

export { classifyResponse, createClassifierScanners, createDefaultRegistry } from './modules/classifier.js';
export {
  createJsMinerScanner,
  mineJavaScript,
  minePatterns,
  mineByEvaluation,
  DEFAULT_EVALUATION_BUDGET,
  type EvaluationBudget,
  type JsMinerOptions,
  type MinedEndpoints,
} from './modules/jsMiner/index.js';

export {
  ScannerRegistry,
  defineScanner,
  isValidScanner,
  type IDiscoveryScanner,
  type ScannerMetadata,
} from './core/IDiscoveryScanner.js';
export { ResultStore, dedupKey, formatDiscovery } from './core/resultStore.js';
export { RunStats, type RunStatsSnapshot } from './core/runStats.js';
export { ReconError, InputError, OutputIOError, EvaluationFault, ScannerError, ErrorCode } from './core/errors.js';
export { applyVerbosity, createModuleLogger } from './core/logger.js';
export * from './core/types.js';
