import { describe, it, expect, vi } from 'vitest';
import { TransferError } from '../src/transfer/errors.js';
import { InvalidTransitionError, isTerminal, TransferStateMachine } from '../src/transfer/state.js';
import type { TransferStatus } from '../src/transfer/types.js';

describe('TransferStateMachine', () => {
  it('should start idle', () => {
    expect(new TransferStateMachine().current).toEqual({ status: 'idle' });
  });

  it('should follow a run with a pause to completion', () => {
    const machine = new TransferStateMachine();
    const seen: TransferStatus[] = [];
    machine.onChange(state => seen.push(state.status));

    machine.dispatch('start');
    machine.dispatch('chunk');
    machine.dispatch('pause');
    machine.dispatch('resume');
    machine.dispatch('chunk');
    machine.dispatch('complete');

    expect(seen).toEqual(['running', 'paused', 'running', 'completed']);
  });

  it('should go through cancelling on the way to cancelled', () => {
    const machine = new TransferStateMachine();
    machine.dispatch('start');
    machine.dispatch('pause');
    machine.dispatch('cancel');
    expect(machine.status).toBe('cancelling');

    machine.dispatch('halt');
    expect(machine.status).toBe('cancelled');
  });

  it('should allow skipping straight to completed', () => {
    const machine = new TransferStateMachine();
    machine.dispatch('skip');
    expect(machine.status).toBe('completed');
  });

  it('should carry the failure reason', () => {
    const machine = new TransferStateMachine();
    const reason = new TransferError('TransportFailure', 'HTTP 500: Internal Server Error');
    machine.dispatch('start');

    machine.fail(reason);

    expect(machine.current).toEqual({ status: 'failed', reason });
  });

  it('should allow failing before the transfer starts', () => {
    const machine = new TransferStateMachine();
    machine.fail(new TransferError('InputValidation', 'bad url'));
    expect(machine.status).toBe('failed');
  });

  it('should reject events the current state does not accept', () => {
    const machine = new TransferStateMachine();

    expect(() => machine.dispatch('chunk')).toThrow(InvalidTransitionError);
    expect(() => machine.dispatch('resume')).toThrow('Event "resume" is not allowed in state "idle"');

    machine.dispatch('start');
    expect(() => machine.dispatch('halt')).toThrow(InvalidTransitionError);
  });

  it('should accept nothing once terminal', () => {
    const machine = new TransferStateMachine();
    machine.dispatch('start');
    machine.dispatch('complete');

    for (const event of ['start', 'chunk', 'pause', 'resume', 'cancel', 'halt', 'complete', 'fail'] as const) {
      expect(machine.can(event)).toBe(false);
    }
    expect(() => machine.fail(new TransferError('IOFailure', 'late'))).toThrow(InvalidTransitionError);
    expect(machine.status).toBe('completed');
  });

  it('should notify listeners only on real changes', () => {
    const machine = new TransferStateMachine();
    const listener = vi.fn();
    machine.onChange(listener);

    machine.dispatch('start');
    machine.dispatch('chunk');
    machine.dispatch('chunk');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ status: 'running' }, { status: 'idle' });
  });

  it('should keep notifying after a listener throws', () => {
    const machine = new TransferStateMachine();
    const second = vi.fn();
    machine.onChange(() => {
      throw new Error('listener failure');
    });
    machine.onChange(second);

    machine.dispatch('start');

    expect(second).toHaveBeenCalledTimes(1);
    expect(machine.status).toBe('running');
  });

  it('should stop notifying after unsubscribe', () => {
    const machine = new TransferStateMachine();
    const listener = vi.fn();
    const unsubscribe = machine.onChange(listener);

    unsubscribe();
    machine.dispatch('start');

    expect(listener).not.toHaveBeenCalled();
  });

  it('should classify terminal statuses', () => {
    const terminal: TransferStatus[] = ['completed', 'cancelled', 'failed'];
    expect(terminal.every(isTerminal)).toBe(true);
    expect(isTerminal('running')).toBe(false);
    expect(isTerminal('cancelling')).toBe(false);
  });
});
