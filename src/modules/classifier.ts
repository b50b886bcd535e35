/**
 * Built-in response classifiers and the default scanner registry
 */

import { ScannerRegistry, type IDiscoveryScanner } from '../core/IDiscoveryScanner.js';
import type { Candidate, Discovery, FetchResult } from '../core/types.js';
import { getDefaultCatalog, type DiscoveryCatalog } from '../config/catalog.js';
import { apiDocScanner } from './apiDocDetector.js';
import { createSpaRouteScanner } from './spaRouteDetector.js';
import { environmentScanner } from './environmentDetector.js';
import { configPathScanner } from './configPathDetector.js';
import { createJsMinerScanner, type JsMinerOptions } from './jsMiner/index.js';

export function createClassifierScanners(catalog: DiscoveryCatalog = getDefaultCatalog()): IDiscoveryScanner[] {
  return [apiDocScanner, createSpaRouteScanner(catalog), environmentScanner, configPathScanner];
}

/**
 * Every applicable classifier variant for one response
 */
export async function classifyResponse(
  candidate: Candidate,
  result: FetchResult,
  scanners: readonly IDiscoveryScanner[] = createClassifierScanners()
): Promise<Discovery[]> {
  if (result.error || result.status === undefined || result.status === 404) return [];

  const discoveries: Discovery[] = [];
  for (const scanner of scanners) {
    if (scanner.appliesTo && !scanner.appliesTo(candidate, result)) continue;
    discoveries.push(...(await scanner.scan(candidate, result)));
  }
  return discoveries;
}

export interface DefaultRegistryOptions {
  catalog?: DiscoveryCatalog;
  jsMiner: JsMinerOptions;
  extraScanners?: readonly unknown[];
}

/**
 * Classifiers, then the JS miner, then any extra scanners in the order given
 */
export function createDefaultRegistry(options: DefaultRegistryOptions): ScannerRegistry {
  const catalog = options.catalog ?? getDefaultCatalog();
  const registry = new ScannerRegistry();
  for (const scanner of createClassifierScanners(catalog)) registry.register(scanner);
  registry.register(createJsMinerScanner({ parameterNames: catalog.parameterNames, ...options.jsMiner }));
  for (const scanner of options.extraScanners ?? []) registry.register(scanner);
  return registry;
}
