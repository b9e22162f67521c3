// src/core/filter/prefix.ts
import * as fs from 'fs/promises';
import { MAX_PREFIX_LENGTH } from '../config/constants.js';
import { ErrorCode, createIssue, throwIfAborted } from '../errors.js';
import type { FileEntry, IssueHandler, PrefixGroup } from '../types/index.js';
import type { ContentReader } from '../verify/reader.js';

/**
 * Reads up to `length` bytes from the start of a file.
 * A file shorter than `length` yields its whole content.
 */
export async function readPrefix(filePath: string, length: number): Promise<Buffer> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      const { bytesRead } = await handle.read(buffer, filled, length - filled, filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return buffer.subarray(0, filled);
  } finally {
    await handle.close();
  }
}

export interface PrefixFilterOptions {
  prefixLength: number;
  reader: ContentReader;
  signal?: AbortSignal;
  onIssue: IssueHandler;
}

/**
 * Sub-groups one size group by prefix bytes.
 * Unreadable files are reported and dropped; groups under two members are discarded.
 */
export async function groupByPrefix(entries: FileEntry[], options: PrefixFilterOptions): Promise<PrefixGroup> {
  const groups: PrefixGroup = new Map();

  for (const entry of entries) {
    throwIfAborted(options.signal);

    let key: string;
    try {
      // never ask for more than the file holds
      const length = Math.min(options.prefixLength, entry.size, MAX_PREFIX_LENGTH);
      const prefix = await options.reader.readPrefix(entry.path, length);
      key = prefix.toString('hex');
    } catch (error) {
      options.onIssue(createIssue('prefix', ErrorCode.PREFIX_READ_FAILED, entry.path, error));
      continue;
    }

    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }

  for (const [key, group] of groups) {
    if (group.length < 2) {
      groups.delete(key);
    }
  }

  return groups;
}
