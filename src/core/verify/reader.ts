// src/core/verify/reader.ts
import { readPrefix } from '../filter/prefix.js';
import { HASH_CHUNK_SIZE, DIGEST_ALGORITHM } from '../config/constants.js';
import type { Digest } from '../types/index.js';
import { hashFile } from './digest.js';

/** File content access used by the prefix and hash stages. */
export interface ContentReader {
  readPrefix(filePath: string, length: number): Promise<Buffer>;
  digest(filePath: string, signal?: AbortSignal): Promise<Digest>;
}

export const fsContentReader: ContentReader = {
  readPrefix,
  digest: (filePath, signal) =>
    hashFile(filePath, { algorithm: DIGEST_ALGORITHM, chunkSize: HASH_CHUNK_SIZE, signal }),
};
