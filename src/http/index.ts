export * from './types.js';
export { NodeFetchStreamingFetch, createStreamingFetch, parseContentLength, parseContentRange } from './fetcher.js';
export type { NodeFetchOptions } from './fetcher.js';
export { HeadReachabilityProbe, createReachabilityProbe, parseHttpUrl } from './probe.js';
export type { HeadProbeOptions } from './probe.js';
