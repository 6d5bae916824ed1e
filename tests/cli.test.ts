import { describe, it, expect, vi, afterEach } from 'vitest';
import winston from 'winston';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { parseArgs } from '../src/cli/args.js';
import { createKeyHandler } from '../src/cli/controls.js';
import { applyLogging } from '../src/cli/logging.js';
import { describeOutcome, exitCodeFor } from '../src/cli/output.js';
import { TransferError } from '../src/transfer/errors.js';
import { Logger } from '../src/utils/logger.js';

describe('parseArgs', () => {
  it('should build a file request with defaults', () => {
    expect(parseArgs(['https://files.test/a.zip'])).toEqual({
      kind: 'transfer',
      request: {
        url: 'https://files.test/a.zip',
        destination: undefined,
        resume: true,
        mode: 'file',
        quality: undefined,
      },
      logging: { verbose: false, file: undefined },
    });
  });

  it('should read every option', () => {
    expect(parseArgs(['--media', '-q', '720p', '--no-resume', '-o', 'clips/out.mp4', 'https://video.test/v'])).toEqual({
      kind: 'transfer',
      request: {
        url: 'https://video.test/v',
        destination: 'clips/out.mp4',
        resume: false,
        mode: 'media',
        quality: '720p',
      },
      logging: { verbose: false, file: undefined },
    });
  });

  it('should accept inline values', () => {
    const command = parseArgs(['--output=backup.bin', '--quality=best', 'https://files.test/a.bin']);

    expect(command).toMatchObject({ kind: 'transfer', request: { destination: 'backup.bin', quality: 'best' } });
  });

  it('should accept the youtube alias', () => {
    expect(parseArgs(['--youtube', 'https://video.test/v'])).toMatchObject({ request: { mode: 'media' } });
  });

  it('should return help', () => {
    expect(parseArgs(['https://files.test/a.zip', '--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('should list formats', () => {
    expect(parseArgs(['--list-formats', 'https://video.test/v'])).toEqual({
      kind: 'list-formats',
      url: 'https://video.test/v',
      logging: { verbose: false, file: undefined },
    });
  });

  it('should read the logging options', () => {
    expect(parseArgs(['-v', '--log-file', 'logs/transfer.log', 'https://files.test/a.zip'])).toMatchObject({
      kind: 'transfer',
      logging: { verbose: true, file: 'logs/transfer.log' },
    });
    expect(parseArgs(['--verbose', '--log-file=run.log', '--list-formats', 'https://video.test/v'])).toEqual({
      kind: 'list-formats',
      url: 'https://video.test/v',
      logging: { verbose: true, file: 'run.log' },
    });
    expect(parseArgs(['--log-file'])).toEqual({ kind: 'error', message: 'Option --log-file needs a value' });
  });

  it('should report usage errors', () => {
    expect(parseArgs([])).toEqual({ kind: 'error', message: 'Missing <url>' });
    expect(parseArgs(['-o'])).toEqual({ kind: 'error', message: 'Option -o needs a value' });
    expect(parseArgs(['--fast', 'https://files.test/a'])).toEqual({ kind: 'error', message: 'Unknown option: --fast' });
    expect(parseArgs(['https://files.test/a', 'https://files.test/b'])).toEqual({
      kind: 'error',
      message: 'Unexpected argument: https://files.test/b',
    });
  });
});

describe('createKeyHandler', () => {
  function target(): { pause: () => void; resume: () => void; cancel: () => void } {
    return { pause: vi.fn(), resume: vi.fn(), cancel: vi.fn() };
  }

  it('should toggle pause with p', () => {
    const session = target();
    const toggled = vi.fn();
    const onKey = createKeyHandler(session, toggled);

    onKey('p', { name: 'p' });
    onKey('p', { name: 'p' });

    expect(session.pause).toHaveBeenCalledTimes(1);
    expect(session.resume).toHaveBeenCalledTimes(1);
    expect(toggled.mock.calls).toEqual([[true], [false]]);
  });

  it('should cancel with c and with Ctrl-C', () => {
    const session = target();
    const onKey = createKeyHandler(session);

    onKey('c', { name: 'c' });
    onKey('\u0003', { name: 'c', ctrl: true });

    expect(session.cancel).toHaveBeenCalledTimes(2);
  });

  it('should ignore other keys', () => {
    const session = target();
    const onKey = createKeyHandler(session);

    onKey('x', { name: 'x' });
    onKey(undefined, undefined);
    onKey('\u0010', { name: 'p', ctrl: true });

    expect(session.pause).not.toHaveBeenCalled();
    expect(session.cancel).not.toHaveBeenCalled();
  });
});

describe('outcome output', () => {
  it('should describe each outcome', () => {
    expect(
      describeOutcome({ status: 'completed', filePath: '/downloads/a.zip', bytes: 2048, alreadyComplete: false })
    ).toBe('Download completed: /downloads/a.zip (2.00 KB)');
    expect(
      describeOutcome({ status: 'completed', filePath: '/downloads/a.zip', bytes: 2048, alreadyComplete: true })
    ).toBe('Already complete: /downloads/a.zip (2.00 KB)');
    expect(describeOutcome({ status: 'cancelled', filePath: '/downloads/a.zip', bytes: 512 })).toBe(
      'Download cancelled: 512.00 B kept in /downloads/a.zip'
    );
    expect(
      describeOutcome({ status: 'failed', error: new TransferError('TransportFailure', 'HTTP 500: Internal Server Error') })
    ).toBe('Download failed [TransportFailure]: HTTP 500: Internal Server Error');
  });

  it('should exit non-zero unless completed', () => {
    expect(exitCodeFor({ status: 'completed', filePath: 'a', bytes: 1, alreadyComplete: true })).toBe(0);
    expect(exitCodeFor({ status: 'cancelled', filePath: 'a', bytes: 1 })).toBe(1);
    expect(exitCodeFor({ status: 'failed', error: new TransferError('IOFailure', 'disk full') })).toBe(1);
  });
});

describe('applyLogging', () => {
  const logFile = join(tmpdir(), 'transfer-cli.log');

  afterEach(async () => {
    Logger.reset();
    await fs.rm(logFile, { force: true });
  });

  it('should leave the configured level alone without flags', async () => {
    Logger.reset();
    const target = Logger.getInstance();

    await applyLogging({ verbose: false }, target);

    expect(target.getLogger().level).toBe('error');
    expect(target.getLogger().transports.some(transport => transport instanceof winston.transports.File)).toBe(false);
  });

  it('should raise the level and add the log file', async () => {
    Logger.reset();
    const target = Logger.getInstance();

    await applyLogging({ verbose: true, file: logFile }, target);

    const fileTransport = target.getLogger().transports.find(transport => transport instanceof winston.transports.File);
    expect(target.getLogger().level).toBe('debug');
    expect(fileTransport instanceof winston.transports.File ? fileTransport.filename : undefined).toBe('transfer-cli.log');
  });
});
