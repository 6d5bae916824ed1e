import type { ByteRange } from '../transfer/types.js';

export type FetchStatus = 'full' | 'partial' | 'unsatisfiable' | 'error';

export interface FetchOptions {
  range?: ByteRange;
  headers?: Record<string, string>;
}

/** Parsed `Content-Range`; `size` is absent when the server sent `*` */
export interface ContentRange {
  start?: number;
  end?: number;
  size?: number;
}

export interface FetchResponse {
  status: FetchStatus;
  statusCode: number;
  statusText: string;
  /** Content-Length of this response; 0 when absent */
  declaredLength: number;
  contentType?: string;
  contentRange?: ContentRange;
  /** Lazy, forward-only body. Not restartable. */
  chunks: AsyncIterable<Uint8Array>;
  /** Drops the connection. Safe to call more than once, read or not. */
  close(): void;
}

export interface StreamingFetch {
  open(url: string, options?: FetchOptions): Promise<FetchResponse>;
}

export interface ProbeResult {
  reachable: boolean;
  declaredSize?: number;
  contentKind?: string;
  /** Set when reachable is false */
  reason?: string;
}

/**
 * Never rejects: failures are folded into the result.
 */
export interface ReachabilityProbe {
  probe(url: string): Promise<ProbeResult>;
}
