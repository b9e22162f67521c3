// src/core/scan/walker.ts
import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import * as path from 'path';
import { ErrorCode, createIssue, describeError, throwIfAborted } from '../errors.js';
import type { IssueHandler } from '../types/index.js';

export interface WalkOptions {
  recursive: boolean;
  signal?: AbortSignal;
  onIssue: IssueHandler;
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Yields candidate file paths under `root`, depth-first, entries sorted by name.
 *
 * Symlinks are yielded as files; the caller's stat decides whether they point
 * at a regular file. Symlinked directories are never entered.
 */
export async function* walkFiles(root: string, options: WalkOptions): AsyncGenerator<string> {
  throwIfAborted(options.signal);

  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    options.onIssue(createIssue('traverse', ErrorCode.READ_DIR_FAILED, root, error));
    return;
  }

  entries.sort(byName);

  for (const entry of entries) {
    throwIfAborted(options.signal);
    const fullPath = path.join(root, entry.name);

    if (entry.isDirectory()) {
      if (options.recursive) {
        yield* walkFiles(fullPath, options);
      }
      continue;
    }

    if (entry.isFile() || entry.isSymbolicLink()) {
      yield fullPath;
    }
  }
}

export type RootCheck =
  | { ok: true; path: string }
  | { ok: false; code: ErrorCode; message: string };

export async function checkRoot(root: string): Promise<RootCheck> {
  const resolved = path.resolve(root);

  try {
    const stats = await fs.stat(resolved);
    if (!stats.isDirectory()) {
      return { ok: false, code: ErrorCode.NOT_A_DIRECTORY, message: `'${root}' is not a directory, skipped` };
    }
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { ok: false, code: ErrorCode.ROOT_NOT_FOUND, message: `Directory '${root}' does not exist, skipped` };
    }
    return {
      ok: false,
      code: ErrorCode.ROOT_UNREADABLE,
      message: `Cannot access '${root}', skipped: ${describeError(error)}`,
    };
  }

  return { ok: true, path: resolved };
}
