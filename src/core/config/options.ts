// src/core/config/options.ts
import { DupsweepError, ErrorCode } from '../errors.js';
import { DEFAULT_PREFIX_LENGTH, MAX_PREFIX_LENGTH } from './constants.js';

/** Raw option values as commander hands them over. */
export interface ScanCommandOptions {
  recursive?: boolean;
  delete?: boolean;
  yes?: boolean;
  prefixBytes?: string;
  json?: boolean;
  verbose?: boolean;
}

export interface ScanSettings {
  roots: string[];
  recursive: boolean;
  deleteDuplicates: boolean;
  assumeYes: boolean;
  prefixLength: number;
  json: boolean;
  verbose: boolean;
  warnings: string[];
}

export function parsePrefixLength(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_PREFIX_LENGTH;
  }

  const trimmed = value.trim();
  const length = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!(length <= MAX_PREFIX_LENGTH)) {
    throw new DupsweepError(
      ErrorCode.INVALID_OPTION,
      `Invalid prefix length: ${value}`,
      `Use an integer from 0 to ${MAX_PREFIX_LENGTH}, e.g. --prefix-bytes 8`,
      { option: 'prefixBytes', value }
    );
  }
  return length;
}

export function resolveScanOptions(roots: string[], options: ScanCommandOptions): ScanSettings {
  if (roots.length === 0) {
    throw new DupsweepError(ErrorCode.INVALID_OPTION, 'At least one path is required', undefined, {
      option: 'paths',
    });
  }

  const warnings: string[] = [];
  const deleteDuplicates = options.delete ?? false;
  let assumeYes = options.yes ?? false;

  if (assumeYes && !deleteDuplicates) {
    warnings.push('--yes has no effect without --delete');
    assumeYes = false;
  }

  return {
    roots,
    recursive: options.recursive ?? true,
    deleteDuplicates,
    assumeYes,
    prefixLength: parsePrefixLength(options.prefixBytes),
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    warnings,
  };
}
