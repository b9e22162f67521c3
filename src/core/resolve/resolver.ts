// src/core/resolve/resolver.ts
import * as fs from 'fs/promises';
import { ErrorCode, createIssue } from '../errors.js';
import type { DuplicateSet, FileEntry, ScanIssue } from '../types/index.js';

export type ConfirmFn = (message: string) => Promise<boolean>;

export interface FileRemover {
  exists(filePath: string): Promise<boolean>;
  remove(filePath: string): Promise<void>;
}

export const fsRemover: FileRemover = {
  async exists(filePath) {
    try {
      await fs.stat(filePath);
      return true;
    } catch {
      return false;
    }
  },
  remove: (filePath) => fs.unlink(filePath),
};

export interface ResolveOptions {
  assumeYes?: boolean;
  confirm?: ConfirmFn;
  signal?: AbortSignal;
  onDeleted?: (entry: FileEntry) => void;
  onIssue?: (issue: ScanIssue) => void;
}

export type ResolveStatus = 'completed' | 'declined' | 'cancelled' | 'nothing-to-do';

export interface DeletionSummary {
  status: ResolveStatus;
  deleted: FileEntry[];
  failures: ScanIssue[];
  reclaimedBytes: number;
}

/** Σ size × (members − 1) */
export function recoverableSpace(sets: DuplicateSet[]): number {
  return sets.reduce((sum, set) => sum + set.size * set.duplicates.length, 0);
}

export function countDeleteCandidates(sets: DuplicateSet[]): number {
  return sets.reduce((sum, set) => sum + set.duplicates.length, 0);
}

export class DuplicateResolver {
  constructor(private readonly remover: FileRemover = fsRemover) {}

  /**
   * Deletes every `duplicates` member, never `keep`. A member reached through a
   * symlink is deleted at its real path.
   * Each unlink stands alone: a failure is recorded and the rest still run.
   */
  async resolve(sets: DuplicateSet[], options: ResolveOptions = {}): Promise<DeletionSummary> {
    const summary: DeletionSummary = {
      status: 'completed',
      deleted: [],
      failures: [],
      reclaimedBytes: 0,
    };

    const total = countDeleteCandidates(sets);
    if (total === 0) {
      summary.status = 'nothing-to-do';
      return summary;
    }

    if (!options.assumeYes) {
      const confirmed = options.confirm
        ? await options.confirm(`Delete ${total} duplicate file(s)?`)
        : false;
      if (!confirmed) {
        summary.status = 'declined';
        return summary;
      }
    }

    const fail = (issue: ScanIssue): void => {
      summary.failures.push(issue);
      options.onIssue?.(issue);
    };

    for (const set of sets) {
      if (options.signal?.aborted) {
        summary.status = 'cancelled';
        return summary;
      }

      if (!(await this.remover.exists(set.keep.realPath))) {
        fail({
          stage: 'delete',
          code: ErrorCode.KEEP_MISSING,
          path: set.keep.path,
          message: `Kept copy is gone, leaving ${set.duplicates.length} duplicate(s) in place`,
        });
        continue;
      }

      for (const entry of set.duplicates) {
        if (options.signal?.aborted) {
          summary.status = 'cancelled';
          return summary;
        }

        try {
          await this.remover.remove(entry.realPath);
        } catch (error) {
          fail(createIssue('delete', ErrorCode.DELETE_FAILED, entry.realPath, error));
          continue;
        }

        // a link reached before its target: the target is gone, drop the dangling link too
        if (entry.path !== entry.realPath) {
          try {
            await this.remover.remove(entry.path);
          } catch (error) {
            fail(createIssue('delete', ErrorCode.DELETE_FAILED, entry.path, error));
          }
        }

        summary.deleted.push(entry);
        summary.reclaimedBytes += entry.size;
        options.onDeleted?.(entry);
      }
    }

    return summary;
  }
}
