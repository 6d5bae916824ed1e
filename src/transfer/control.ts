import { logger } from '../utils/logger.js';

/**
 * Cooperative control flags shared between a caller and one running transfer.
 *
 * The pause flag is level-triggered and may be toggled freely. The cancel flag
 * is sticky. The worker samples both at chunk boundaries and parks on
 * {@link ControlChannel.waitWhilePaused} instead of polling.
 */
export class ControlChannel {
  private paused = false;
  private cancelled = false;
  private waiters: Array<() => void> = [];

  get isPaused(): boolean {
    return this.paused;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  public pause(): void {
    if (!this.cancelled) {
      this.paused = true;
    }
  }

  public resume(): void {
    this.paused = false;
    this.release();
  }

  public cancel(): void {
    this.cancelled = true;
    this.release();
  }

  /**
   * Resolves once the transfer may continue: the pause flag is clear or the
   * transfer was cancelled.
   */
  public async waitWhilePaused(): Promise<void> {
    while (this.paused && !this.cancelled) {
      await new Promise<void>(resolve => {
        this.waiters.push(resolve);
      });
    }
  }

  private release(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}

export type Listener<T> = (value: T) => void;

/**
 * Single-slot channel with overwrite semantics. Publishing never blocks the
 * producer; listeners receive the newest value on the next turn of the event
 * loop and intermediate values may be dropped.
 */
export class LatestValueChannel<T> {
  private value: T | undefined;
  private scheduled: NodeJS.Immediate | undefined;
  private readonly listeners = new Set<Listener<T>>();

  public latest(): T | undefined {
    return this.value;
  }

  public publish(value: T): void {
    this.value = value;
    if (this.scheduled === undefined && this.listeners.size > 0) {
      this.scheduled = setImmediate(() => this.deliver());
    }
  }

  public subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Deliver a pending value right away. Called when the producer finishes so
   * the last value is never lost.
   */
  public flush(): void {
    if (this.scheduled !== undefined) {
      clearImmediate(this.scheduled);
      this.deliver();
    }
  }

  private deliver(): void {
    this.scheduled = undefined;
    const value = this.value;
    if (value === undefined) {
      return;
    }
    for (const listener of this.listeners) {
      try {
        listener(value);
      } catch (error) {
        logger().warn('Progress listener threw', { error });
      }
    }
  }
}
