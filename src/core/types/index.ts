// src/core/types/index.ts

export interface FileEntry {
  path: string;       // absolute path, as reached by the walk
  realPath: string;   // symlinks resolved; equals `path` for plain files
  size: number;       // bytes, cached from stat at scan time
}

/** Byte size -> files of that size, in traversal order. */
export type SizeGroup = Map<number, FileEntry[]>;

/** Hex-encoded prefix bytes -> files sharing that prefix. Scoped to one size. */
export type PrefixGroup = Map<string, FileEntry[]>;

/** Hex-encoded content fingerprint. */
export type Digest = string;

export type DigestAlgorithm = 'md5' | 'sha1' | 'sha256';

export interface DuplicateSet {
  digest: Digest;
  size: number;
  keep: FileEntry;
  duplicates: FileEntry[];
}

export type IssueStage = 'traverse' | 'stat' | 'prefix' | 'hash' | 'delete';

export interface ScanIssue {
  stage: IssueStage;
  code: string;
  path: string;
  message: string;
}

export type IssueHandler = (issue: ScanIssue) => void;

export type ProgressStage = 'scan' | 'prefix' | 'hash';

export interface ProgressEvent {
  stage: ProgressStage;
  processed: number;
  total?: number;
}

export type ProgressHandler = (event: ProgressEvent) => void;
