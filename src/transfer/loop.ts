import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { dirname } from 'path';
import { ControlChannel } from './control.js';
import { TransferError } from './errors.js';
import { ProgressTracker } from './progress.js';
import { ResumeNegotiator } from './resume.js';
import { TransferStateMachine } from './state.js';
import { Clock, ProgressSink, ResumeDecision } from './types.js';
import type { FetchResponse, StreamingFetch } from '../http/types.js';
import { ensureDir } from '../utils/filesystem.js';
import { logger } from '../utils/logger.js';

export interface TransferLoopOptions {
  url: string;
  destination: string;
  decision: ResumeDecision;
  fetcher: StreamingFetch;
  negotiator: ResumeNegotiator;
  control: ControlChannel;
  machine: TransferStateMachine;
  /** Size reported by the probe; used only when the response carries no length */
  probedSize?: number;
  /** Declared totals at or above this many bytes are refused */
  sizeLimit?: number;
  sink?: ProgressSink;
  clock?: Clock;
}

/**
 * Chunk-boundary check shared by every transfer kind. Parks while the pause
 * flag is set and returns false once the transfer has been cancelled, leaving
 * the machine in `cancelling`. The session may already have moved the machine
 * to `paused` or `cancelling` when the request came in.
 */
export async function crossBoundary(
  control: ControlChannel,
  machine: TransferStateMachine,
  context: Record<string, unknown>
): Promise<boolean> {
  if (control.isPaused && !control.isCancelled) {
    if (machine.status === 'running') {
      machine.dispatch('pause');
    }
    logger().info('Transfer paused', context);
    await control.waitWhilePaused();
  }

  if (control.isCancelled) {
    if (machine.can('cancel')) {
      machine.dispatch('cancel');
    }
    return false;
  }

  if (machine.status === 'paused') {
    machine.dispatch('resume');
    logger().info('Transfer resumed', context);
  }
  return true;
}

export type LoopResult =
  | { status: 'completed'; bytes: number; alreadyComplete: boolean }
  | { status: 'cancelled'; bytes: number }
  | { status: 'failed'; bytes: number; error: TransferError };

/**
 * Copies one response body into the destination file, one chunk at a time.
 *
 * Pause and cancel are only looked at between chunks, and a chunk that has
 * been read is always written in full first, so the file on disk always ends
 * on a chunk boundary.
 */
export class TransferLoop {
  private readonly clock: Clock;
  private file: FileHandle | undefined;
  private response: FetchResponse | undefined;
  private source: AsyncIterator<Uint8Array> | undefined;
  private bytes: number;

  constructor(private readonly options: TransferLoopOptions) {
    this.clock = options.clock ?? Date.now;
    this.bytes = options.decision.offset;
  }

  async run(): Promise<LoopResult> {
    const { machine, control, url, destination, fetcher } = this.options;
    machine.dispatch('start');

    try {
      const response = await fetcher.open(url, { range: this.options.decision.range });
      this.response = response;
      this.source = response.chunks[Symbol.asyncIterator]();
      if (response.status === 'error') {
        throw new TransferError('TransportFailure', `HTTP ${response.statusCode}: ${response.statusText}`);
      }

      const reconciled = this.options.negotiator.reconcile(this.options.decision, {
        status: response.status,
        contentRange: response.contentRange,
      });
      if (reconciled.kind === 'already-complete') {
        await this.release();
        this.bytes = reconciled.localSize;
        return await this.finish(true);
      }

      const decision = reconciled.decision;
      this.bytes = decision.offset;

      const total = this.resolveTotal(response, decision);
      this.enforceSizeLimit(total);

      // Opened only now: a rejected range must truncate before any new byte lands
      this.file = await this.openDestination(decision);

      logger().info('Transfer started', { url, destination, offset: decision.offset, total });

      const tracker = new ProgressTracker({ total, initialBytes: decision.offset, startedAt: this.clock() });

      for (;;) {
        if (!(await crossBoundary(control, machine, { destination, bytes: this.bytes }))) {
          await this.release();
          return this.halt();
        }

        const chunk = await this.readChunk();
        if (chunk === undefined) {
          break;
        }
        if (total > 0 && this.bytes + chunk.length > total) {
          throw new TransferError(
            'ProtocolViolation',
            `Source exceeded the declared ${total} bytes`
          );
        }

        await this.writeChunk(chunk);
        this.bytes += chunk.length;

        const sample = tracker.observe(this.bytes, this.clock());
        // pause() or cancel() may have moved the machine during the read
        if (machine.status === 'running') {
          machine.dispatch('chunk');
        }
        this.options.sink?.(sample);
      }

      await this.release();
      if (total > 0 && this.bytes !== total) {
        throw new TransferError(
          'ProtocolViolation',
          `Stream ended at ${this.bytes} of ${total} bytes`
        );
      }

      return await this.finish(false);
    } catch (error) {
      const reason = TransferError.from('TransportFailure', error);
      await this.releaseQuietly();
      machine.fail(reason);
      logger().error('Transfer failed', { url, destination, kind: reason.kind, error: reason });
      return { status: 'failed', bytes: this.bytes, error: reason };
    }
  }

  /** End of stream is a boundary too: a pending pause or cancel is honored first. */
  private async finish(alreadyComplete: boolean): Promise<LoopResult> {
    const { machine, control, destination } = this.options;
    if (!(await crossBoundary(control, machine, { destination, bytes: this.bytes }))) {
      return this.halt();
    }
    machine.dispatch('complete');
    logger().info('Transfer completed', { destination, bytes: this.bytes, alreadyComplete });
    return { status: 'completed', bytes: this.bytes, alreadyComplete };
  }

  private halt(): LoopResult {
    this.options.machine.dispatch('halt');
    logger().info('Transfer cancelled', { destination: this.options.destination, bytes: this.bytes });
    return { status: 'cancelled', bytes: this.bytes };
  }

  private resolveTotal(response: FetchResponse, decision: ResumeDecision): number {
    const rangedSize = response.contentRange?.size;
    if (response.status === 'partial' && rangedSize !== undefined) {
      return rangedSize;
    }
    if (response.declaredLength > 0) {
      return response.status === 'partial'
        ? decision.offset + response.declaredLength
        : response.declaredLength;
    }
    return this.options.probedSize ?? 0;
  }

  private enforceSizeLimit(total: number): void {
    const { sizeLimit } = this.options;
    if (sizeLimit !== undefined && total >= sizeLimit) {
      throw new TransferError('InputValidation', `Declared size ${total} exceeds the ${sizeLimit} byte limit`);
    }
  }

  private async openDestination(decision: ResumeDecision): Promise<FileHandle> {
    const { destination } = this.options;
    try {
      await ensureDir(dirname(destination));
      return await fs.open(destination, decision.writeMode === 'append' ? 'a' : 'w');
    } catch (error) {
      throw TransferError.from('IOFailure', error);
    }
  }

  private async readChunk(): Promise<Uint8Array | undefined> {
    if (!this.source) {
      return undefined;
    }
    try {
      const next = await this.source.next();
      return next.done ? undefined : next.value;
    } catch (error) {
      throw TransferError.from('TransportFailure', error);
    }
  }

  private async writeChunk(chunk: Uint8Array): Promise<void> {
    if (!this.file) {
      throw new TransferError('IOFailure', 'Destination is not open');
    }
    try {
      let written = 0;
      while (written < chunk.length) {
        const { bytesWritten } = await this.file.write(chunk, written, chunk.length - written);
        written += bytesWritten;
      }
    } catch (error) {
      throw TransferError.from('IOFailure', error);
    }
  }

  private async release(): Promise<void> {
    const { source, response, file } = this;
    this.source = undefined;
    this.response = undefined;
    this.file = undefined;

    if (source?.return) {
      try {
        await source.return();
      } catch (error) {
        logger().debug('Source did not close cleanly', { error });
      }
    }
    response?.close();
    if (file) {
      try {
        await file.close();
      } catch (error) {
        throw TransferError.from('IOFailure', error);
      }
    }
  }

  private async releaseQuietly(): Promise<void> {
    try {
      await this.release();
    } catch (error) {
      logger().warn('Failed to close destination after error', { destination: this.options.destination, error });
    }
  }
}
