// src/cli/commands/scan.ts
import { Command } from 'commander';
import { DuplicateFinder } from '../../core/finder.js';
import { DuplicateResolver } from '../../core/resolve/resolver.js';
import type { ConfirmFn, DeletionSummary, FileRemover } from '../../core/resolve/resolver.js';
import { DupsweepError, isCancelled } from '../../core/errors.js';
import { DEFAULT_PREFIX_LENGTH, EXIT_CODES } from '../../core/config/constants.js';
import { resolveScanOptions, type ScanCommandOptions, type ScanSettings } from '../../core/config/options.js';
import { describeEntry, formatIssue, renderDeletionSummary, renderReport } from '../../core/report/format.js';
import { buildJsonReport } from '../../core/report/json.js';
import type { ProgressEvent, ScanIssue } from '../../core/types/index.js';
import { createConsoleConfirm } from '../prompt.js';

export interface ScanDependencies {
  confirm?: ConfirmFn;
  remover?: FileRemover;
}

export function registerScanCommand(program: Command, deps: ScanDependencies = {}): void {
  program
    .argument('<paths...>', 'One or more directories to scan')
    .option('--no-recursive', 'Scan only the direct children of each directory')
    .option('--delete', 'Delete duplicates, keeping the first copy found', false)
    .option('-y, --yes', 'Skip the confirmation prompt (with --delete)', false)
    .option('--prefix-bytes <n>', 'Bytes compared before hashing, 0 disables the check', String(DEFAULT_PREFIX_LENGTH))
    .option('--json', 'Output JSON report to stdout', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (paths: string[], options: ScanCommandOptions) => {
      await handleScan(paths, options, deps);
    });
}

function printIssue(issue: ScanIssue): void {
  const marker = issue.stage === 'delete' ? '✗' : '⚠';
  console.error(`${marker} ${formatIssue(issue)}`);
}

function interrupted(): void {
  console.error('\nInterrupted by user.');
  process.exit(EXIT_CODES.interrupted);
}

function createProgressPrinter(settings: ScanSettings): { onProgress?: (event: ProgressEvent) => void; end: () => void } {
  if (settings.json || settings.verbose || !process.stderr.isTTY) {
    return { end: () => undefined };
  }

  let printed = false;
  return {
    onProgress: (event) => {
      if (event.stage === 'scan') {
        process.stderr.write(`\r  Files scanned: ${event.processed}...`);
        printed = true;
      }
    },
    end: () => {
      if (printed) process.stderr.write('\n');
    },
  };
}

export async function handleScan(
  paths: string[],
  options: ScanCommandOptions,
  deps: ScanDependencies = {}
): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const settings = resolveScanOptions(paths, options);
    settings.warnings.forEach((warning) => console.error(`⚠ ${warning}`));

    if (!settings.json) {
      console.log(`Scanning: ${settings.roots.join(', ')}`);
    }

    const progress = createProgressPrinter(settings);
    const finder = new DuplicateFinder({
      recursive: settings.recursive,
      prefixLength: settings.prefixLength,
      signal: controller.signal,
      verbose: settings.verbose,
      onIssue: printIssue,
      onProgress: progress.onProgress,
    });

    const result = await finder.find(settings.roots);
    progress.end();

    if (!settings.json) {
      console.log(
        `Scanned ${result.stats.filesScanned} file(s) in ${(result.stats.durationMs / 1000).toFixed(1)}s\n`
      );
      renderReport(result.sets).forEach((line) => console.log(line));
    }

    let deletion: DeletionSummary | undefined;
    if (settings.deleteDuplicates && result.sets.length > 0) {
      const resolver = new DuplicateResolver(deps.remover);
      deletion = await resolver.resolve(result.sets, {
        assumeYes: settings.assumeYes,
        confirm:
          deps.confirm ??
          createConsoleConfirm({
            output: settings.json ? process.stderr : process.stdout,
            signal: controller.signal,
            onInterrupt: onSigint,
          }),
        signal: controller.signal,
        onDeleted: (entry) => {
          if (!settings.json) console.log(`✓ Deleted: ${describeEntry(entry)}`);
        },
        onIssue: printIssue,
      });

      if (!settings.json) {
        if (deletion.status === 'declined') {
          console.log('Deletion skipped.');
        } else {
          console.log('');
          renderDeletionSummary(deletion).forEach((line) => console.log(line));
        }
      }
    }

    if (settings.json) {
      console.log(JSON.stringify(buildJsonReport(result, deletion), null, 2));
    }

    if (deletion?.status === 'cancelled') {
      interrupted();
    }
  } catch (error) {
    if (isCancelled(error) || controller.signal.aborted) {
      interrupted();
      return;
    }

    console.error('Error:', error instanceof Error ? error.message : error);
    if (error instanceof DupsweepError && error.suggestion) {
      console.error(`Hint: ${error.suggestion}`);
    }
    process.exit(EXIT_CODES.failure);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
