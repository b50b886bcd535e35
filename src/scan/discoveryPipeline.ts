/**
 * Per-result pipeline: count, classify, mine, commit, and hand back any
 * linked JS assets for the scheduler to fetch.
 */

import type { ScannerRegistry } from '../core/IDiscoveryScanner.js';
import type { ResultStore } from '../core/resultStore.js';
import type { RunStats } from '../core/runStats.js';
import { bodyText, type Candidate, type Discovery, type FetchResult } from '../core/types.js';
import { createModuleLogger } from '../core/logger.js';
import { scanner as scannerConfig } from '../core/env.js';
import { buildAssetCandidate } from '../util/candidateExpander.js';
import { extractScriptSources, isHtmlResponse, isSameSite, parseDocument } from '../util/htmlAssets.js';

const log = createModuleLogger('discoveryPipeline');

export interface DiscoveryPipelineOptions {
  registry: ScannerRegistry;
  store: ResultStore;
  stats: RunStats;
  maxAssetsPerPage?: number;
}

export class DiscoveryPipeline {
  private readonly registry: ScannerRegistry;
  private readonly store: ResultStore;
  private readonly stats: RunStats;
  private readonly maxAssetsPerPage: number;

  constructor(options: DiscoveryPipelineOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.stats = options.stats;
    this.maxAssetsPerPage = options.maxAssetsPerPage ?? scannerConfig.MAX_ASSETS_PER_PAGE;
  }

  /**
   * Scheduler result handler. Store errors propagate and halt the run.
   */
  readonly handle = async (candidate: Candidate, result: FetchResult): Promise<Candidate[]> => {
    this.stats.recordFetch(result);

    if (result.error) {
      log.debug({ url: result.url, error: result.error, message: result.errorMessage }, 'Fetch failed');
      return [];
    }
    if (result.truncated) {
      log.debug({ url: result.url }, 'Body truncated at size ceiling');
    }

    const discoveries = await this.runScanners(candidate, result);
    for (const discovery of discoveries) {
      if (await this.store.record(discovery)) {
        this.stats.discoveries++;
        log.info({ kind: discovery.kind, value: discovery.value }, 'Discovery');
      } else {
        this.stats.duplicates++;
      }
    }

    return this.linkedAssets(candidate, result);
  };

  private async runScanners(candidate: Candidate, result: FetchResult): Promise<Discovery[]> {
    const discoveries: Discovery[] = [];
    for (const scanner of this.registry.list()) {
      try {
        if (scanner.appliesTo && !scanner.appliesTo(candidate, result)) continue;
        discoveries.push(...(await scanner.scan(candidate, result)));
      } catch (error) {
        this.stats.scannerFailures++;
        log.warn({ scanner: scanner.metadata.id, url: result.url, err: error }, 'Scanner failed');
      }
    }
    return discoveries;
  }

  /**
   * Same-site `<script src>` assets of an HTML page, capped per page
   */
  linkedAssets(candidate: Candidate, result: FetchResult): Candidate[] {
    const status = result.status;
    if (candidate.kind === 'asset' || candidate.origin.isIpAddress) return [];
    if (status === undefined || status < 200 || status >= 300 || !isHtmlResponse(result)) return [];

    const assets: Candidate[] = [];
    for (const url of extractScriptSources(parseDocument(bodyText(result)), result.finalUrl)) {
      if (!isSameSite(url.hostname, candidate.origin.host)) continue;
      assets.push(buildAssetCandidate(candidate.origin, url));
      if (assets.length >= this.maxAssetsPerPage) break;
    }
    return assets;
  }
}
