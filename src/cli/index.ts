#!/usr/bin/env node

import { createTransferSession } from '../index.js';
import { createMediaSource } from '../media/ytdlp.js';
import { formatLabel } from '../media/formats.js';
import { formatProgressLine } from '../utils/format.js';
import { logger } from '../utils/logger.js';
import { parseArgs, USAGE } from './args.js';
import { applyLogging } from './logging.js';
import { attachControls } from './controls.js';
import { describeOutcome, exitCodeFor, EXIT_FAILED, EXIT_OK, EXIT_USAGE } from './output.js';
import type { TransferRequest } from '../transfer/types.js';

async function listFormats(url: string): Promise<number> {
  const formats = await createMediaSource().listFormats(url);
  if (formats.length === 0) {
    console.log('No progressive formats found; use -q best');
    return EXIT_OK;
  }
  for (const format of formats) {
    console.log(formatLabel(format));
  }
  return EXIT_OK;
}

async function transfer(request: TransferRequest): Promise<number> {
  const session = createTransferSession(request);

  const unsubscribe = session.progress.subscribe(sample => {
    process.stdout.write(`\r${formatProgressLine(sample)}`);
  });
  const detach = attachControls(session, process.stdin, paused => {
    process.stdout.write(paused ? '\n[paused] press p to resume\n' : '\n[resumed]\n');
  });

  try {
    const outcome = await session.run();
    process.stdout.write('\n');
    const message = describeOutcome(outcome);
    if (outcome.status === 'failed') {
      console.error(message);
    } else {
      console.log(message);
    }
    return exitCodeFor(outcome);
  } finally {
    detach();
    unsubscribe();
  }
}

async function main(): Promise<number> {
  const command = parseArgs(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      console.log(USAGE);
      return EXIT_OK;
    case 'error':
      console.error(`Error: ${command.message}`);
      console.error(USAGE);
      return EXIT_USAGE;
    case 'list-formats':
      await applyLogging(command.logging);
      return listFormats(command.url);
    case 'transfer':
      await applyLogging(command.logging);
      return transfer(command.request);
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger().error('Unexpected error', { error });
    process.exitCode = EXIT_FAILED;
  });
