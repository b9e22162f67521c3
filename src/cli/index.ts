#!/usr/bin/env node

import { Command } from 'commander';
import { registerScanCommand } from './commands/scan.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('dupsweep')
    .description('Find duplicate files and optionally delete the extra copies')
    .version('0.1.0');

  registerScanCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
