import type { CommandFailure, ProgressCallback } from '../types.js';

export interface BatchOptions {
  /** Record a failing item and move on instead of rethrowing */
  continueOnError?: boolean;
  onProgress?: ProgressCallback;
}

export interface BatchResult<T> {
  results: { command: string; value: T }[];
  failed: CommandFailure[];
}

/**
 * Run `task` for each command in order. Errors only stay contained when the
 * batch has more than one command and `continueOnError` is set.
 */
export const runBatch = async <T>(
  commands: string[],
  task: (command: string) => Promise<T>,
  options: BatchOptions = {}
): Promise<BatchResult<T>> => {
  const isolate = (options.continueOnError ?? true) && commands.length > 1;
  const results: BatchResult<T>['results'] = [];
  const failed: CommandFailure[] = [];

  for (const [index, command] of commands.entries()) {
    options.onProgress?.(index + 1, commands.length, command);
    try {
      results.push({ command, value: await task(command) });
    } catch (error) {
      if (!isolate) {
        throw error;
      }
      failed.push({ command, error: error instanceof Error ? error : new Error(String(error)) });
    }
  }

  return { results, failed };
};
