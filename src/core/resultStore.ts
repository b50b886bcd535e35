/**
 * Result store: deduplicates Discoveries and appends them to the run's output file.
 *
 * Check, insert and append run under one mutex, so the file order is the
 * order in which discoveries were first committed and a duplicate racing its
 * original never produces a second line.
 */

import { copyFile, open, rename, type FileHandle } from 'node:fs/promises';
import { Mutex } from 'async-mutex';
import { DISCOVERY_TAGS, type Discovery } from './types.js';
import { Errors, systemErrorCode } from './errors.js';
import { output } from './env.js';
import { createModuleLogger } from './logger.js';

const log = createModuleLogger('resultStore');

/**
 * Variant tag plus trimmed, lowercased value
 */
export function dedupKey(discovery: Pick<Discovery, 'kind' | 'value'>): string {
  return `${discovery.kind}:${discovery.value.trim().toLowerCase()}`;
}

/**
 * One output line, without the newline
 */
export function formatDiscovery(discovery: Discovery): string {
  const tag = `[${DISCOVERY_TAGS[discovery.kind]}]`;
  const value = discovery.value.trim();

  switch (discovery.kind) {
    case 'EnvironmentHit': {
      const parts = [tag, value];
      if (discovery.status !== undefined) parts.push(`[${discovery.status}]`);
      if (discovery.detail) parts.push(discovery.detail);
      return parts.join(' ');
    }
    case 'ConfigPathHit':
      return discovery.status !== undefined ? `${tag} ${value} [${discovery.status}]` : `${tag} ${value}`;
    default:
      return `${tag} ${value}`;
  }
}

export interface ResultStoreOptions {
  /** Called with each committed line, e.g. to echo it to stdout */
  onCommit?: (line: string, discovery: Discovery) => void;
  backupSuffix?: string;
}

export class ResultStore {
  readonly path: string;
  readonly backupPath: string;
  private readonly mutex = new Mutex();
  private readonly seen = new Set<string>();
  private readonly onCommit?: (line: string, discovery: Discovery) => void;
  private handle: FileHandle | null = null;
  private committed = 0;
  private duplicates = 0;

  constructor(path: string, options: ResultStoreOptions = {}) {
    this.path = path;
    this.backupPath = `${path}${options.backupSuffix ?? output.BACKUP_SUFFIX}`;
    this.onCommit = options.onCommit;
  }

  get committedCount(): number {
    return this.committed;
  }

  get duplicateCount(): number {
    return this.duplicates;
  }

  /**
   * Rotate the previous output into the backup and truncate the output for this run
   */
  async open(): Promise<void> {
    if (this.handle) return;

    const tmpPath = `${this.backupPath}.tmp`;
    try {
      await copyFile(this.path, tmpPath);
      await rename(tmpPath, this.backupPath);
      log.debug({ backup: this.backupPath }, 'Previous output backed up');
    } catch (error) {
      if (systemErrorCode(error) !== 'ENOENT') {
        throw Errors.backupFailed(this.backupPath, error);
      }
    }

    try {
      this.handle = await open(this.path, 'w');
    } catch (error) {
      throw Errors.outputOpenFailed(this.path, error);
    }
  }

  /**
   * Commit a discovery unless its DedupKey was already seen.
   * Resolves true when a line was written.
   */
  async record(discovery: Discovery): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const handle = this.handle;
      if (!handle) throw Errors.outputNotOpen();

      const key = dedupKey(discovery);
      if (this.seen.has(key)) {
        this.duplicates++;
        return false;
      }

      const line = formatDiscovery(discovery);
      try {
        await handle.appendFile(`${line}\n`, 'utf8');
      } catch (error) {
        throw Errors.outputWriteFailed(this.path, error);
      }

      this.seen.add(key);
      this.committed++;
      this.onCommit?.(line, discovery);
      return true;
    });
  }

  has(discovery: Pick<Discovery, 'kind' | 'value'>): boolean {
    return this.seen.has(dedupKey(discovery));
  }

  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const handle = this.handle;
      if (!handle) return;
      this.handle = null;
      try {
        await handle.close();
      } catch (error) {
        throw Errors.outputWriteFailed(this.path, error);
      }
    });
  }
}
