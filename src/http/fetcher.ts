import fetch, { Response } from 'node-fetch';
import { Readable } from 'stream';
import { ContentRange, FetchOptions, FetchResponse, FetchStatus, StreamingFetch } from './types.js';
import { logger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';

export interface NodeFetchOptions {
  /** Applies until response headers arrive; the body is never timed out */
  connectTimeout?: number;
  userAgent?: string;
}

export function parseContentLength(value: string | null): number {
  if (value === null) {
    return 0;
  }
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

export function parseContentRange(value: string | null): ContentRange | undefined {
  if (value === null) {
    return undefined;
  }
  const match = /^bytes\s+(?:(\d+)-(\d+)|\*)\/(\d+|\*)$/i.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, start, end, size] = match;
  return {
    start: start === undefined ? undefined : parseInt(start, 10),
    end: end === undefined ? undefined : parseInt(end, 10),
    size: size === '*' ? undefined : parseInt(size, 10),
  };
}

function classify(response: Response): FetchStatus {
  if (response.status === 206) {
    return 'partial';
  }
  if (response.status === 416) {
    return 'unsatisfiable';
  }
  return response.ok ? 'full' : 'error';
}

async function* bodyChunks(body: NodeJS.ReadableStream | null): AsyncGenerator<Uint8Array> {
  if (body === null) {
    return;
  }
  for await (const chunk of body) {
    yield typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
  }
}

export class NodeFetchStreamingFetch implements StreamingFetch {
  private readonly connectTimeout: number;
  private readonly userAgent: string;

  constructor(options: NodeFetchOptions = {}) {
    const config = getConfig().transfer;
    this.connectTimeout = options.connectTimeout ?? config.connectTimeout;
    this.userAgent = options.userAgent ?? config.userAgent;
  }

  async open(url: string, options: FetchOptions = {}): Promise<FetchResponse> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent, ...options.headers };
    if (options.range) {
      headers['Range'] = `bytes=${options.range.start}-`;
    }

    logger().debug('Opening stream', { url, range: headers['Range'] });

    const response = await this.fetchWithTimeout(url, headers);
    const body = response.body;

    return {
      status: classify(response),
      statusCode: response.status,
      statusText: response.statusText,
      declaredLength: parseContentLength(response.headers.get('content-length')),
      contentType: response.headers.get('content-type') ?? undefined,
      contentRange: parseContentRange(response.headers.get('content-range')),
      chunks: bodyChunks(body),
      close: () => {
        // Also covers a body that was never iterated
        if (body instanceof Readable && !body.destroyed) {
          body.destroy();
        }
      },
    };
  }

  private async fetchWithTimeout(url: string, headers: Record<string, string>): Promise<Response> {
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), this.connectTimeout);

    try {
      // Uncompressed, so Content-Length counts the bytes that reach the file
      return await fetch(url, { headers, compress: false, signal: abortController.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Connection timeout after ${this.connectTimeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function createStreamingFetch(options?: NodeFetchOptions): StreamingFetch {
  return new NodeFetchStreamingFetch(options);
}
