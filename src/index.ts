import { createReachabilityProbe, createStreamingFetch } from './http/index.js';
import { createMediaSource } from './media/index.js';
import { TransferSession } from './transfer/session.js';
import type { TransferDependencies, TransferSessionOptions } from './transfer/session.js';
import type { TransferRequest } from './transfer/types.js';

export * from './transfer/index.js';
export * from './http/index.js';
export * from './media/index.js';
export { ConfigManager, getConfig } from './config/index.js';
export type { Config } from './config/types.js';
export { formatBytes, formatDuration, formatProgressLine } from './utils/format.js';

/**
 * Session wired to the default adapters: HEAD probe and streaming GET over
 * node-fetch, yt-dlp for media. Any adapter can be replaced.
 */
export function createTransferSession(
  request: TransferRequest,
  options: TransferSessionOptions = {},
  overrides: Partial<TransferDependencies> = {}
): TransferSession {
  return new TransferSession(
    request,
    {
      probe: overrides.probe ?? createReachabilityProbe(),
      fetcher: overrides.fetcher ?? createStreamingFetch(),
      media: overrides.media ?? createMediaSource(),
      negotiator: overrides.negotiator,
      destinations: overrides.destinations,
    },
    options
  );
}
