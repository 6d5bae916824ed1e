import { TransferError } from './errors.js';
import { TransferEvent, TransferState, TransferStatus } from './types.js';
import { logger } from '../utils/logger.js';

const TRANSITIONS: Record<TransferStatus, Partial<Record<TransferEvent, TransferStatus>>> = {
  idle: { start: 'running', skip: 'completed', fail: 'failed' },
  running: { chunk: 'running', pause: 'paused', cancel: 'cancelling', complete: 'completed', fail: 'failed' },
  paused: { resume: 'running', cancel: 'cancelling', fail: 'failed' },
  cancelling: { halt: 'cancelled', fail: 'failed' },
  completed: {},
  cancelled: {},
  failed: {},
};

const TERMINAL: ReadonlySet<TransferStatus> = new Set(['completed', 'cancelled', 'failed']);

export type StateListener = (state: TransferState, previous: TransferState) => void;

export function isTerminal(status: TransferStatus): boolean {
  return TERMINAL.has(status);
}

export class InvalidTransitionError extends Error {
  constructor(from: TransferStatus, event: TransferEvent) {
    super(`Event "${event}" is not allowed in state "${from}"`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Holds the single state of one transfer. Every change goes through the
 * transition table; anything else throws.
 */
export class TransferStateMachine {
  private state: TransferState = { status: 'idle' };
  private readonly listeners = new Set<StateListener>();

  get current(): TransferState {
    return this.state;
  }

  get status(): TransferStatus {
    return this.state.status;
  }

  public can(event: TransferEvent): boolean {
    return TRANSITIONS[this.state.status][event] !== undefined;
  }

  public dispatch(event: Exclude<TransferEvent, 'fail'>): TransferState {
    const next = TRANSITIONS[this.state.status][event];
    if (next === undefined || next === 'failed') {
      throw new InvalidTransitionError(this.state.status, event);
    }
    return this.enter({ status: next });
  }

  public fail(reason: TransferError): TransferState {
    if (!this.can('fail')) {
      throw new InvalidTransitionError(this.state.status, 'fail');
    }
    return this.enter({ status: 'failed', reason });
  }

  public onChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private enter(next: TransferState): TransferState {
    const previous = this.state;
    this.state = next;
    // chunk events keep the state; listeners only hear real changes
    if (previous.status !== next.status) {
      for (const listener of this.listeners) {
        try {
          listener(next, previous);
        } catch (error) {
          logger().warn('State listener threw', { status: next.status, error });
        }
      }
    }
    return next;
  }
}
