import type { TransferOutcome } from '../transfer/types.js';
import { formatBytes } from '../utils/format.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export function exitCodeFor(outcome: TransferOutcome): number {
  return outcome.status === 'completed' ? EXIT_OK : EXIT_FAILED;
}

export function describeOutcome(outcome: TransferOutcome): string {
  switch (outcome.status) {
    case 'completed':
      return outcome.alreadyComplete
        ? `Already complete: ${outcome.filePath} (${formatBytes(outcome.bytes)})`
        : `Download completed: ${outcome.filePath} (${formatBytes(outcome.bytes)})`;
    case 'cancelled':
      return `Download cancelled: ${formatBytes(outcome.bytes)} kept in ${outcome.filePath}`;
    case 'failed':
      return `Download failed [${outcome.error.kind}]: ${outcome.error.message}`;
  }
}
