import type { CommandFailure } from '../types.js';
import { CmdocError } from '../errors.js';
import { logger } from '../ui/index.js';

/** Report the commands a batch could not document and fail the run */
export const reportFailures = (failed: CommandFailure[], total: number): void => {
  if (failed.length === 0) {
    return;
  }

  logger.blank();
  for (const { command, error } of failed) {
    logger.file('fail', command);
    logger.dim(`    ${error.message}`);
  }

  throw new CmdocError(`${failed.length} of ${total} commands could not be documented`, 'BATCH_FAILED', [
    'Fix the listed commands and rerun, or exclude them with --exclude',
  ]);
};
