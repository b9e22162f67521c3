// src/core/index.ts
export { DuplicateFinder } from './finder.js';
export type { FinderOptions, DetectionResult, DetectionStats } from './finder.js';
export { DuplicateResolver, fsRemover, recoverableSpace, countDeleteCandidates } from './resolve/resolver.js';
export type { ConfirmFn, FileRemover, ResolveOptions, DeletionSummary, ResolveStatus } from './resolve/resolver.js';
export { buildSizeIndex, pruneSizeIndex } from './scan/size-index.js';
export { groupByPrefix, readPrefix } from './filter/prefix.js';
export { groupByDigest, hashFile } from './verify/digest.js';
export { fsContentReader } from './verify/reader.js';
export type { ContentReader } from './verify/reader.js';
export { formatSize, renderReport } from './report/format.js';
export { buildJsonReport } from './report/json.js';
export { DupsweepError, ErrorCode } from './errors.js';
export type * from './types/index.js';
