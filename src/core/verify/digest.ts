// src/core/verify/digest.ts
import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { ErrorCode, createIssue, throwIfAborted } from '../errors.js';
import type { Digest, DigestAlgorithm, DuplicateSet, FileEntry, IssueHandler } from '../types/index.js';
import type { ContentReader } from './reader.js';

export interface HashOptions {
  algorithm: DigestAlgorithm;
  chunkSize: number;
  signal?: AbortSignal;
}

/** Streams the file through the hash in `chunkSize` reads; memory stays flat for any file size. */
export async function hashFile(filePath: string, options: HashOptions): Promise<Digest> {
  const hash = createHash(options.algorithm);
  const stream = createReadStream(filePath, { highWaterMark: options.chunkSize });

  try {
    for await (const chunk of stream) {
      throwIfAborted(options.signal);
      hash.update(chunk);
    }
  } finally {
    stream.destroy();
  }

  return hash.digest('hex');
}

export interface VerifyOptions {
  reader: ContentReader;
  signal?: AbortSignal;
  onIssue: IssueHandler;
}

/**
 * Confirms duplicates inside one prefix group by full-content digest.
 * Equal digests are taken as equal content.
 */
export async function groupByDigest(entries: FileEntry[], options: VerifyOptions): Promise<DuplicateSet[]> {
  const byDigest = new Map<Digest, FileEntry[]>();

  for (const entry of entries) {
    throwIfAborted(options.signal);

    let digest: Digest;
    try {
      digest = await options.reader.digest(entry.path, options.signal);
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      options.onIssue(createIssue('hash', ErrorCode.HASH_FAILED, entry.path, error));
      continue;
    }

    const group = byDigest.get(digest);
    if (group) {
      group.push(entry);
    } else {
      byDigest.set(digest, [entry]);
    }
  }

  const sets: DuplicateSet[] = [];
  for (const [digest, [keep, ...duplicates]] of byDigest) {
    if (keep && duplicates.length > 0) {
      sets.push({ digest, size: keep.size, keep, duplicates });
    }
  }
  return sets;
}
