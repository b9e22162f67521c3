// src/core/errors.ts
import type { IssueStage, ScanIssue } from './types/index.js';

export enum ErrorCode {
  ROOT_NOT_FOUND = 'root_not_found',
  NOT_A_DIRECTORY = 'not_a_directory',
  ROOT_UNREADABLE = 'root_unreadable',
  READ_DIR_FAILED = 'read_dir_failed',
  STAT_FAILED = 'stat_failed',
  PREFIX_READ_FAILED = 'prefix_read_failed',
  HASH_FAILED = 'hash_failed',
  DELETE_FAILED = 'delete_failed',
  KEEP_MISSING = 'keep_missing',
  CANCELLED = 'cancelled',
  INVALID_OPTION = 'invalid_option',
}

export class DupsweepError extends Error {
  code: ErrorCode;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DupsweepError';
    this.code = code;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function isCancelled(error: unknown): boolean {
  return error instanceof DupsweepError && error.code === ErrorCode.CANCELLED;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new DupsweepError(ErrorCode.CANCELLED, 'Operation cancelled');
  }
}

// fs errors carry an errno code (ENOENT, EACCES...) worth surfacing
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const errno = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (errno && !error.message.startsWith(errno)) {
      return `${errno}: ${error.message}`;
    }
    return error.message;
  }
  return String(error);
}

export function createIssue(
  stage: IssueStage,
  code: ErrorCode,
  filePath: string,
  error: unknown
): ScanIssue {
  return {
    stage,
    code,
    path: filePath,
    message: describeError(error),
  };
}
