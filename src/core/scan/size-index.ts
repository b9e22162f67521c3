// src/core/scan/size-index.ts
import * as fs from 'fs/promises';
import { ErrorCode, createIssue, throwIfAborted } from '../errors.js';
import { PROGRESS_INTERVAL } from '../config/constants.js';
import type { FileEntry, IssueHandler, ProgressHandler, SizeGroup } from '../types/index.js';
import { checkRoot, walkFiles } from './walker.js';

export interface SizeIndexOptions {
  recursive: boolean;
  signal?: AbortSignal;
  onIssue: IssueHandler;
  onProgress?: ProgressHandler;
  onRoot?: (root: string) => void;
}

export interface SizeIndex {
  groups: SizeGroup;
  filesScanned: number;
}

export async function buildSizeIndex(roots: string[], options: SizeIndexOptions): Promise<SizeIndex> {
  const groups: SizeGroup = new Map();
  const seen = new Set<string>();
  let filesScanned = 0;

  for (const root of roots) {
    const check = await checkRoot(root);
    if (!check.ok) {
      options.onIssue({ stage: 'traverse', code: check.code, path: root, message: check.message });
      continue;
    }

    options.onRoot?.(check.path);

    for await (const filePath of walkFiles(check.path, options)) {
      let size: number;
      let identity: string;
      try {
        // stat follows symlinks: a link to a regular file counts as that file
        const stats = await fs.stat(filePath);
        if (!stats.isFile()) {
          continue;
        }
        size = stats.size;
        identity = await fs.realpath(filePath);
      } catch (error) {
        options.onIssue(createIssue('stat', ErrorCode.STAT_FAILED, filePath, error));
        continue;
      }

      // the same file reached twice would otherwise pair with itself
      if (seen.has(identity)) {
        continue;
      }
      seen.add(identity);

      filesScanned++;
      if (filesScanned % PROGRESS_INTERVAL === 0) {
        options.onProgress?.({ stage: 'scan', processed: filesScanned });
      }

      const entry: FileEntry = { path: filePath, realPath: identity, size };
      const group = groups.get(size);
      if (group) {
        group.push(entry);
      } else {
        groups.set(size, [entry]);
      }
    }
  }

  throwIfAborted(options.signal);
  return { groups, filesScanned };
}

/** Drops sizes held by a single file: they cannot have a duplicate. */
export function pruneSizeIndex(groups: SizeGroup): SizeGroup {
  const pruned: SizeGroup = new Map();
  for (const [size, entries] of groups) {
    if (entries.length >= 2) {
      pruned.set(size, entries);
    }
  }
  return pruned;
}
