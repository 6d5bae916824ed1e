import type { TransferError } from './errors.js';

export type TransferMode = 'file' | 'media';

export interface TransferRequest {
  url: string;
  /** Inferred from the URL or content type when absent */
  destination?: string;
  resume: boolean;
  mode: TransferMode;
  /** Format selector for media transfers; ignored for plain files */
  quality?: string;
}

export type TransferStatus =
  | 'idle'
  | 'running'
  | 'paused'
  | 'cancelling'
  | 'completed'
  | 'cancelled'
  | 'failed';

export type TransferState =
  | { status: Exclude<TransferStatus, 'failed'> }
  | { status: 'failed'; reason: TransferError };

export type TransferEvent =
  | 'start'
  | 'skip'
  | 'chunk'
  | 'pause'
  | 'resume'
  | 'cancel'
  | 'halt'
  | 'complete'
  | 'fail';

export type WriteMode = 'truncate' | 'append';

export interface ByteRange {
  /** First byte requested; the range is open-ended */
  start: number;
}

export interface ResumeDecision {
  offset: number;
  writeMode: WriteMode;
  range?: ByteRange;
}

export type Negotiation =
  | { kind: 'transfer'; decision: ResumeDecision }
  | { kind: 'already-complete'; localSize: number };

export interface ProgressSample {
  bytes: number;
  /** 0 when the size is unknown */
  total: number;
  /** bytes per second over the most recent interval */
  speed: number;
  /** seconds remaining; undefined when the total is unknown or speed is zero */
  eta?: number;
  percent?: number;
  timestamp: number;
}

export type ProgressSink = (sample: ProgressSample) => void;

export type TransferOutcome =
  | { status: 'completed'; filePath: string; bytes: number; alreadyComplete: boolean }
  | { status: 'cancelled'; filePath: string; bytes: number }
  | { status: 'failed'; error: TransferError; filePath?: string };

export type Clock = () => number;
