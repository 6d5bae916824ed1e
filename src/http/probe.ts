import fetch from 'node-fetch';
import { ProbeResult, ReachabilityProbe } from './types.js';
import { parseContentLength } from './fetcher.js';
import { logger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';

export interface HeadProbeOptions {
  timeout?: number;
  /**
   * Servers that block HEAD often answer 403 for resources that do exist.
   * When true such a response counts as reachable with unknown size.
   */
  forbiddenIsReachable?: boolean;
  userAgent?: string;
}

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

export function parseHttpUrl(url: string): URL | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }
  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol) || parsed.hostname === '') {
    return undefined;
  }
  return parsed;
}

/**
 * HEAD-based reachability check. Network failures are treated as reachable
 * with unknown metadata so the transfer itself gets a chance to run.
 */
export class HeadReachabilityProbe implements ReachabilityProbe {
  private readonly timeout: number;
  private readonly forbiddenIsReachable: boolean;
  private readonly userAgent: string;

  constructor(options: HeadProbeOptions = {}) {
    const config = getConfig();
    this.timeout = options.timeout ?? config.probe.timeout;
    this.forbiddenIsReachable = options.forbiddenIsReachable ?? config.probe.forbiddenIsReachable;
    this.userAgent = options.userAgent ?? config.transfer.userAgent;
  }

  async probe(url: string): Promise<ProbeResult> {
    if (!parseHttpUrl(url)) {
      return { reachable: false, reason: `Not an http(s) URL: ${url}` };
    }

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: 'HEAD',
        redirect: 'follow',
        headers: { 'User-Agent': this.userAgent },
        signal: abortController.signal,
      });

      if (response.status === 403 && this.forbiddenIsReachable) {
        logger().debug('HEAD forbidden, assuming reachable', { url });
        return { reachable: true };
      }

      if (response.status !== 200 && response.status !== 206) {
        return { reachable: false, reason: `HTTP ${response.status}: ${response.statusText}` };
      }

      const declaredSize = parseContentLength(response.headers.get('content-length'));
      const contentKind = response.headers.get('content-type')?.toLowerCase();
      return {
        reachable: true,
        declaredSize: declaredSize > 0 ? declaredSize : undefined,
        contentKind: contentKind || undefined,
      };
    } catch (error) {
      logger().warn('Probe failed, continuing without metadata', { url, error });
      return { reachable: true };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function createReachabilityProbe(options?: HeadProbeOptions): ReachabilityProbe {
  return new HeadReachabilityProbe(options);
}
