import { Logger, logger } from '../utils/logger.js';
import type { LoggingOptions } from './args.js';

/** Command-line logging flags win over LOG_LEVEL and LOG_FILE. */
export async function applyLogging(options: LoggingOptions, target: Logger = logger()): Promise<void> {
  if (options.verbose) {
    target.setLevel('debug');
  }
  if (options.file !== undefined) {
    await target.setLogFile(options.file);
  }
}
