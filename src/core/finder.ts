// src/core/finder.ts
import { DEFAULT_PREFIX_LENGTH } from './config/constants.js';
import { throwIfAborted } from './errors.js';
import { groupByPrefix } from './filter/prefix.js';
import { countDeleteCandidates, recoverableSpace } from './resolve/resolver.js';
import { buildSizeIndex, pruneSizeIndex } from './scan/size-index.js';
import type { DuplicateSet, FileEntry, ProgressHandler, ScanIssue } from './types/index.js';
import { groupByDigest } from './verify/digest.js';
import { fsContentReader, type ContentReader } from './verify/reader.js';

export interface FinderOptions {
  recursive?: boolean;
  prefixLength?: number;
  reader?: ContentReader;
  signal?: AbortSignal;
  verbose?: boolean;
  onIssue?: (issue: ScanIssue) => void;
  onProgress?: ProgressHandler;
}

export interface DetectionStats {
  filesScanned: number;
  prefixCandidates: number;
  hashCandidates: number;
  duplicateSets: number;
  duplicateFiles: number;
  recoverableBytes: number;
  durationMs: number;
}

export interface DetectionResult {
  sets: DuplicateSet[];
  stats: DetectionStats;
  issues: ScanIssue[];
}

/**
 * Size -> prefix -> digest. Each stage only sees what survived the previous one,
 * and every grouping keeps traversal order, so `keep` is the first file walked.
 */
export class DuplicateFinder {
  private readonly recursive: boolean;
  private readonly prefixLength: number;
  private readonly reader: ContentReader;
  private readonly options: FinderOptions;

  constructor(options: FinderOptions = {}) {
    this.options = options;
    this.recursive = options.recursive ?? true;
    this.prefixLength = options.prefixLength ?? DEFAULT_PREFIX_LENGTH;
    this.reader = options.reader ?? fsContentReader;
  }

  async find(roots: string[]): Promise<DetectionResult> {
    const startTime = Date.now();
    const { signal, onProgress } = this.options;
    const issues: ScanIssue[] = [];
    const onIssue = (issue: ScanIssue): void => {
      issues.push(issue);
      this.options.onIssue?.(issue);
    };

    // Stage 1: size
    const index = await buildSizeIndex(roots, {
      recursive: this.recursive,
      signal,
      onIssue,
      onProgress,
      onRoot: (root) => this.debug(`[Scan] ${root}`),
    });
    const sizeGroups = pruneSizeIndex(index.groups);
    const prefixCandidates = countEntries(sizeGroups.values());
    this.debug(
      `[Scan] ${index.filesScanned} files, ${sizeGroups.size} shared sizes, ${prefixCandidates} candidates`
    );

    // Stage 2: prefix
    const prefixGroups: FileEntry[][] = [];
    let prefixProcessed = 0;
    for (const entries of sizeGroups.values()) {
      const groups = await groupByPrefix(entries, {
        prefixLength: this.prefixLength,
        reader: this.reader,
        signal,
        onIssue,
      });
      prefixGroups.push(...groups.values());
      prefixProcessed += entries.length;
      onProgress?.({ stage: 'prefix', processed: prefixProcessed, total: prefixCandidates });
    }
    const hashCandidates = countEntries(prefixGroups);
    this.debug(`[Prefix] ${prefixGroups.length} groups, ${hashCandidates} files to hash`);

    // Stage 3: digest
    const sets: DuplicateSet[] = [];
    let hashProcessed = 0;
    for (const entries of prefixGroups) {
      sets.push(...(await groupByDigest(entries, { reader: this.reader, signal, onIssue })));
      hashProcessed += entries.length;
      onProgress?.({ stage: 'hash', processed: hashProcessed, total: hashCandidates });
    }
    this.debug(`[Hash] ${sets.length} duplicate sets confirmed`);

    throwIfAborted(signal);

    return {
      sets,
      issues,
      stats: {
        filesScanned: index.filesScanned,
        prefixCandidates,
        hashCandidates,
        duplicateSets: sets.length,
        duplicateFiles: countDeleteCandidates(sets),
        recoverableBytes: recoverableSpace(sets),
        durationMs: Date.now() - startTime,
      },
    };
  }

  private debug(message: string): void {
    if (this.options.verbose) {
      console.error(message);
    }
  }
}

function countEntries(groups: Iterable<unknown[]>): number {
  let count = 0;
  for (const group of groups) {
    count += group.length;
  }
  return count;
}
