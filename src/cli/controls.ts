import readline from 'readline';
import type { ReadStream } from 'tty';

export interface Controllable {
  pause(): void;
  resume(): void;
  cancel(): void;
}

export type KeyHandler = (input: string | undefined, key: readline.Key | undefined) => void;

/**
 * `p` toggles pause, `c` and Ctrl-C cancel. Everything else is ignored.
 */
export function createKeyHandler(target: Controllable, onToggle?: (paused: boolean) => void): KeyHandler {
  let paused = false;
  return (input, key) => {
    const name = key?.name ?? input;
    if (name === 'c') {
      target.cancel();
      return;
    }
    if (name === 'p' && key?.ctrl !== true) {
      paused = !paused;
      if (paused) {
        target.pause();
      } else {
        target.resume();
      }
      onToggle?.(paused);
    }
  };
}

/**
 * Binds keyboard and SIGINT to the target. A second SIGINT exits right away.
 * Returns a function that restores the terminal.
 */
export function attachControls(
  target: Controllable,
  stdin: ReadStream = process.stdin,
  onToggle?: (paused: boolean) => void
): () => void {
  let interrupted = false;
  const onSigint = (): void => {
    if (interrupted) {
      process.exit(130);
    }
    interrupted = true;
    target.cancel();
  };
  process.on('SIGINT', onSigint);

  if (!stdin.isTTY) {
    return () => {
      process.off('SIGINT', onSigint);
    };
  }

  const onKeypress = createKeyHandler(target, onToggle);
  readline.emitKeypressEvents(stdin);
  stdin.setRawMode(true);
  stdin.on('keypress', onKeypress);
  stdin.resume();

  return () => {
    process.off('SIGINT', onSigint);
    stdin.off('keypress', onKeypress);
    stdin.setRawMode(false);
    stdin.pause();
  };
}
