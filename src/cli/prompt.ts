// src/cli/prompt.ts
import * as readline from 'node:readline/promises';
import { AFFIRMATIVE_ANSWERS } from '../core/config/constants.js';
import type { ConfirmFn } from '../core/resolve/resolver.js';

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return AFFIRMATIVE_ANSWERS.some((accepted) => accepted === normalized);
}

export interface ConsoleConfirmOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  signal?: AbortSignal;
  // readline swallows Ctrl+C while a question is open
  onInterrupt?: () => void;
}

export function createConsoleConfirm(options: ConsoleConfirmOptions = {}): ConfirmFn {
  return async (message: string) => {
    const rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
    });

    if (options.onInterrupt) {
      rl.on('SIGINT', options.onInterrupt);
    }

    try {
      const answer = await rl.question(`\n${message} (y/n): `, { signal: options.signal });
      return isAffirmative(answer);
    } finally {
      rl.close();
    }
  };
}
