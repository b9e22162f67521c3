// src/core/report/format.ts
import { ErrorCode } from '../errors.js';
import { recoverableSpace, type DeletionSummary } from '../resolve/resolver.js';
import type { DuplicateSet, FileEntry, ScanIssue } from '../types/index.js';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

export function formatSize(bytes: number): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

export function describeEntry(entry: FileEntry): string {
  return entry.path === entry.realPath ? entry.path : `${entry.path} -> ${entry.realPath}`;
}

export function renderReport(sets: DuplicateSet[]): string[] {
  if (sets.length === 0) {
    return ['No duplicates found.'];
  }

  const lines = [`${sets.length} duplicate group(s) found:`, ''];

  sets.forEach((set, index) => {
    lines.push(`Group ${index + 1} (${formatSize(set.size)} per file):`);
    lines.push(`  → Keep:   ${describeEntry(set.keep)}`);
    for (const entry of set.duplicates) {
      lines.push(`  ✗ Delete: ${describeEntry(entry)}`);
    }
    lines.push('');
  });

  lines.push(`Recoverable space: ${formatSize(recoverableSpace(sets))}`);
  return lines;
}

export function renderDeletionSummary(summary: DeletionSummary): string[] {
  return [
    '━'.repeat(50),
    `Deleted: ${summary.deleted.length} file(s), ${summary.failures.length} failed`,
    `Space reclaimed: ${formatSize(summary.reclaimedBytes)}`,
  ];
}

const ISSUE_LABELS: Record<ScanIssue['stage'], string> = {
  traverse: 'Cannot list',
  stat: 'Cannot read size of',
  prefix: 'Cannot read',
  hash: 'Cannot hash',
  delete: 'Cannot delete',
};

export function formatIssue(issue: ScanIssue): string {
  if (
    issue.code === ErrorCode.ROOT_NOT_FOUND ||
    issue.code === ErrorCode.NOT_A_DIRECTORY ||
    issue.code === ErrorCode.ROOT_UNREADABLE
  ) {
    return issue.message;
  }
  if (issue.code === ErrorCode.KEEP_MISSING) {
    return `${issue.path}: ${issue.message}`;
  }
  return `${ISSUE_LABELS[issue.stage]} ${issue.path}: ${issue.message}`;
}
