// src/core/config/constants.ts
import type { DigestAlgorithm } from '../types/index.js';

export const DEFAULT_PREFIX_LENGTH = 8;
export const MAX_PREFIX_LENGTH = 1024 * 1024; // 1 MiB
export const HASH_CHUNK_SIZE = 8 * 1024; // 8 KiB
export const DIGEST_ALGORITHM: DigestAlgorithm = 'md5';
export const PROGRESS_INTERVAL = 100; // files between progress events

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  interrupted: 130,
} as const;

export const AFFIRMATIVE_ANSWERS = ['y', 'yes'] as const;
