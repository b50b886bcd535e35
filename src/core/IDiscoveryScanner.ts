/**
 * IDiscoveryScanner - Standard interface for response scanners
 *
 * Built-in classifiers and the JS miner implement this interface, and extra
 * scanners passed to executeRun register through the same registry.
 */

import { isDiscoveryKind, type Candidate, type Discovery, type DiscoveryKind, type FetchResult } from './types.js';
import { Errors } from './errors.js';

export interface ScannerMetadata {
  /** Unique scanner identifier (e.g., 'api_doc', 'js_miner') */
  id: string;
  /** Human-readable scanner name */
  name: string;
  /** Brief description of what the scanner reports */
  description: string;
  /** Discovery variants the scanner can emit */
  produces: DiscoveryKind[];
}

/**
 * Standard response scanner interface
 *
 * Example implementation:
 * ```typescript
 * import { defineScanner } from '../core/IDiscoveryScanner.js';
 *
 * export const robotsScanner = defineScanner(
 *   {
 *     id: 'robots',
 *     name: 'Robots Scanner',
 *     description: 'Reports robots.txt files',
 *     produces: ['ConfigPathHit'],
 *   },
 *   (candidate, result) =>
 *     candidate.path === '/robots.txt' && result.status === 200
 *       ? [{ kind: 'ConfigPathHit', value: result.finalUrl, source: candidate.url, status: 200 }]
 *       : []
 * );
 * ```
 */
export interface IDiscoveryScanner {
  /** Scanner metadata for registration and logging */
  metadata: ScannerMetadata;

  /**
   * Optional: cheap filter run before scan()
   */
  appliesTo?(candidate: Candidate, result: FetchResult): boolean;

  /**
   * Inspect one fetch result; must not mutate its inputs
   */
  scan(candidate: Candidate, result: FetchResult): Discovery[] | Promise<Discovery[]>;
}

export type ScanFunction = IDiscoveryScanner['scan'];

/**
 * Helper to create a scanner that conforms to IDiscoveryScanner
 */
export function defineScanner(
  metadata: ScannerMetadata,
  scan: ScanFunction,
  options?: {
    appliesTo?: (candidate: Candidate, result: FetchResult) => boolean;
  }
): IDiscoveryScanner {
  return {
    metadata,
    scan,
    ...(options?.appliesTo ? { appliesTo: options.appliesTo } : {}),
  };
}

/**
 * Type guard to check if an object implements IDiscoveryScanner
 */
export function isValidScanner(obj: unknown): obj is IDiscoveryScanner {
  if (!obj || typeof obj !== 'object') return false;
  const scanner = obj as Partial<IDiscoveryScanner>;
  return (
    typeof scanner.metadata === 'object' &&
    scanner.metadata !== null &&
    typeof scanner.metadata.id === 'string' &&
    scanner.metadata.id.length > 0 &&
    typeof scanner.metadata.name === 'string' &&
    Array.isArray(scanner.metadata.produces) &&
    scanner.metadata.produces.every(isDiscoveryKind) &&
    typeof scanner.scan === 'function' &&
    (scanner.appliesTo === undefined || typeof scanner.appliesTo === 'function')
  );
}

/**
 * Ordered set of scanners, keyed by metadata id
 */
export class ScannerRegistry {
  private readonly scanners = new Map<string, IDiscoveryScanner>();

  register(scanner: unknown): this {
    if (!isValidScanner(scanner)) {
      throw Errors.invalidScanner();
    }
    if (this.scanners.has(scanner.metadata.id)) {
      throw Errors.duplicateScanner(scanner.metadata.id);
    }
    this.scanners.set(scanner.metadata.id, scanner);
    return this;
  }

  unregister(id: string): boolean {
    return this.scanners.delete(id);
  }

  get(id: string): IDiscoveryScanner | undefined {
    return this.scanners.get(id);
  }

  list(): IDiscoveryScanner[] {
    return [...this.scanners.values()];
  }

  get size(): number {
    return this.scanners.size;
  }
}
