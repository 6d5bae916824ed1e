import { TransferError } from './errors.js';
import { Negotiation, ResumeDecision } from './types.js';
import type { ContentRange, FetchStatus } from '../http/types.js';
import { statSize } from '../utils/filesystem.js';
import { logger } from '../utils/logger.js';

export const FRESH_START: Readonly<ResumeDecision> = Object.freeze({ offset: 0, writeMode: 'truncate' });

/**
 * Decides where a transfer starts writing, and whether an existing partial
 * file is extended with a range request or replaced.
 */
export class ResumeNegotiator {
  public async negotiate(
    destination: string,
    resumeAllowed: boolean,
    remoteSize?: number
  ): Promise<Negotiation> {
    if (!resumeAllowed) {
      return { kind: 'transfer', decision: { ...FRESH_START } };
    }

    let localSize: number | undefined;
    try {
      localSize = await statSize(destination);
    } catch (error) {
      throw TransferError.from('IOFailure', error);
    }

    if (localSize === undefined || localSize === 0) {
      return { kind: 'transfer', decision: { ...FRESH_START } };
    }

    if (remoteSize !== undefined && remoteSize > 0 && localSize >= remoteSize) {
      logger().info('Destination already holds the full resource', { destination, localSize, remoteSize });
      return { kind: 'already-complete', localSize };
    }

    logger().info('Resuming from partial file', { destination, offset: localSize });
    return {
      kind: 'transfer',
      decision: { offset: localSize, writeMode: 'append', range: { start: localSize } },
    };
  }

  /**
   * Checks the decision against what the server actually sent. A range the
   * server ignored, or restarted at byte 0, falls back to a fresh start before
   * anything is written. A refused range that begins exactly at the remote end
   * means the local file is already whole.
   */
  public reconcile(
    decision: ResumeDecision,
    answer: { status: Exclude<FetchStatus, 'error'>; contentRange?: ContentRange }
  ): Negotiation {
    const { status, contentRange } = answer;
    const range = decision.range;

    if (range === undefined) {
      if (status === 'partial') {
        throw new TransferError('ProtocolViolation', 'Server sent partial content for a full request');
      }
      if (status === 'unsatisfiable') {
        throw new TransferError('ProtocolViolation', 'Server refused a request without a range');
      }
      return { kind: 'transfer', decision };
    }

    if (status === 'unsatisfiable') {
      const remoteSize = contentRange?.size;
      if (remoteSize === decision.offset) {
        logger().info('Range starts at the remote end, nothing left to fetch', { offset: decision.offset });
        return { kind: 'already-complete', localSize: decision.offset };
      }
      throw new TransferError(
        'ResumeConflict',
        `Cannot resume at byte ${decision.offset}: remote size is ${remoteSize ?? 'unknown'}`
      );
    }

    if (status === 'full') {
      logger().warn('Server ignored the range request, restarting from zero', {
        requestedOffset: decision.offset,
      });
      return { kind: 'transfer', decision: { ...FRESH_START } };
    }

    const start = contentRange?.start;
    if (start !== undefined && start !== range.start) {
      if (start === 0) {
        logger().warn('Server restarted the range at byte 0, rewriting from zero', {
          requestedOffset: decision.offset,
        });
        return { kind: 'transfer', decision: { ...FRESH_START } };
      }
      throw new TransferError('ProtocolViolation', `Server answered from byte ${start} instead of ${range.start}`);
    }
    return { kind: 'transfer', decision };
  }
}
