// src/core/report/json.ts
import type { DetectionResult, DetectionStats } from '../finder.js';
import type { DeletionSummary } from '../resolve/resolver.js';
import type { ScanIssue } from '../types/index.js';

export interface JsonDuplicateSet {
  digest: string;
  size: number;
  keep: string;
  duplicates: string[];
}

export interface JsonReport {
  sets: JsonDuplicateSet[];
  stats: DetectionStats;
  issues: ScanIssue[];
  deletion?: {
    status: DeletionSummary['status'];
    deleted: string[];
    failures: ScanIssue[];
    reclaimedBytes: number;
  };
}

export function buildJsonReport(result: DetectionResult, deletion?: DeletionSummary): JsonReport {
  const report: JsonReport = {
    sets: result.sets.map((set) => ({
      digest: set.digest,
      size: set.size,
      keep: set.keep.path,
      duplicates: set.duplicates.map((entry) => entry.path),
    })),
    stats: result.stats,
    issues: result.issues,
  };

  if (deletion) {
    report.deletion = {
      status: deletion.status,
      deleted: deletion.deleted.map((entry) => entry.path),
      failures: deletion.failures,
      reclaimedBytes: deletion.reclaimedBytes,
    };
  }

  return report;
}
