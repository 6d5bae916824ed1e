import { TransferError } from './errors.js';
import { ProgressSample } from './types.js';

export interface ProgressTrackerOptions {
  /** Declared total in bytes; 0 or undefined means unknown */
  total?: number;
  /** Bytes already on disk before this run started */
  initialBytes?: number;
  startedAt: number;
  /**
   * strict: bytes beyond the declared total are a protocol violation.
   * estimate: the total is a guess and grows to match what was observed.
   */
  totalPolicy?: 'strict' | 'estimate';
}

/**
 * Per-session progress accumulator. Speed is measured over the interval since
 * the previous observation rather than since the session began.
 */
export class ProgressTracker {
  private total: number;
  private readonly policy: 'strict' | 'estimate';
  private current: number;
  private intervalBytes: number;
  private intervalTime: number;
  private speed = 0;

  constructor(options: ProgressTrackerOptions) {
    this.total = normalizeTotal(options.total);
    this.policy = options.totalPolicy ?? 'strict';
    this.current = options.initialBytes ?? 0;
    this.intervalBytes = this.current;
    this.intervalTime = options.startedAt;
  }

  get declaredTotal(): number {
    return this.total;
  }

  get bytes(): number {
    return this.current;
  }

  /**
   * Replace the declared total, used when a media source refines its estimate.
   */
  public setTotal(total: number | undefined): void {
    this.total = normalizeTotal(total);
  }

  public observe(bytes: number, now: number): ProgressSample {
    if (bytes < this.current) {
      throw new TransferError(
        'ProtocolViolation',
        `Byte count went backwards: ${bytes} after ${this.current}`
      );
    }
    if (this.total > 0 && bytes > this.total) {
      if (this.policy === 'strict') {
        throw new TransferError(
          'ProtocolViolation',
          `Source sent ${bytes} bytes but declared ${this.total}`
        );
      }
      this.total = bytes;
    }

    // A zero or negative interval keeps the previous speed; its bytes count
    // towards the next interval instead.
    const elapsedSeconds = (now - this.intervalTime) / 1000;
    if (elapsedSeconds > 0) {
      this.speed = (bytes - this.intervalBytes) / elapsedSeconds;
      this.intervalBytes = bytes;
      this.intervalTime = now;
    }
    this.current = bytes;

    return this.sample(now);
  }

  private sample(timestamp: number): ProgressSample {
    const sample: ProgressSample = {
      bytes: this.current,
      total: this.total,
      speed: this.speed,
      timestamp,
    };
    if (this.total > 0) {
      sample.percent = (this.current / this.total) * 100;
      if (this.speed > 0) {
        sample.eta = (this.total - this.current) / this.speed;
      }
    }
    return sample;
  }
}

function normalizeTotal(total: number | undefined): number {
  return total !== undefined && Number.isFinite(total) && total > 0 ? total : 0;
}
