import { execFile, spawn } from 'child_process';
import { createInterface } from 'readline';
import { promisify } from 'util';
import { selectProgressiveFormats } from './formats.js';
import { MediaDownload, MediaEvent, MediaFetchOptions, MediaFormat, MediaSource } from './types.js';
import { getConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

const PROGRESS_PREFIX = 'TRANSFER-PROGRESS ';
const FILE_PREFIX = 'TRANSFER-FILE ';
const STDERR_TAIL_LINES = 5;

export type OutputLine = MediaEvent | { type: 'destination'; filePath: string };

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Parses one stdout line produced with our progress and print templates.
 * Lines that are not ours return undefined.
 */
export function parseOutputLine(line: string): OutputLine | undefined {
  if (line.startsWith(FILE_PREFIX)) {
    const filePath = line.slice(FILE_PREFIX.length).trim();
    return filePath === '' ? undefined : { type: 'destination', filePath };
  }
  if (!line.startsWith(PROGRESS_PREFIX)) {
    return undefined;
  }

  let progress: unknown;
  try {
    progress = JSON.parse(line.slice(PROGRESS_PREFIX.length));
  } catch {
    logger().debug('Unparseable progress line', { line });
    return undefined;
  }
  if (typeof progress !== 'object' || progress === null) {
    return undefined;
  }

  const record: Record<string, unknown> = { ...progress };
  const downloaded = readNumber(record, 'downloaded_bytes');
  const exact = readNumber(record, 'total_bytes');
  const estimate = readNumber(record, 'total_bytes_estimate');
  const filename = typeof record.filename === 'string' ? record.filename : undefined;

  if (record.status === 'downloading') {
    return {
      type: 'downloading',
      bytes: downloaded ?? 0,
      total: exact ?? estimate ?? 0,
      estimated: exact === undefined,
      filePath: filename,
    };
  }
  if (record.status === 'finished') {
    return { type: 'finished', bytes: exact ?? estimate ?? downloaded ?? 0, filePath: filename };
  }
  return undefined;
}

type ExitResult = { code: number | null } | { error: Error };

export interface YtDlpOptions {
  binary?: string;
}

/**
 * Media source backed by the yt-dlp executable. Progress is read from stdout
 * as one JSON document per line.
 */
export class YtDlpMediaSource implements MediaSource {
  private readonly binary: string;

  constructor(options: YtDlpOptions = {}) {
    this.binary = options.binary ?? getConfig().media.binary;
  }

  async listFormats(url: string): Promise<MediaFormat[]> {
    try {
      const { stdout } = await execFileAsync(
        this.binary,
        ['--dump-single-json', '--no-playlist', '--no-warnings', url],
        { maxBuffer: 64 * 1024 * 1024 }
      );
      const formats = selectProgressiveFormats(JSON.parse(stdout));
      logger().debug('Listed media formats', { url, count: formats.length });
      return formats;
    } catch (error) {
      logger().warn('Could not list media formats', { url, error });
      return [];
    }
  }

  fetch(url: string, formatId: string, destinationTemplate: string, options: MediaFetchOptions): MediaDownload {
    const args = [
      '--format', formatId,
      '--output', destinationTemplate,
      '--no-playlist',
      '--newline',
      '--no-colors',
      '--progress',
      '--progress-template', `download:${PROGRESS_PREFIX}%(progress)j`,
      '--print', `after_move:${FILE_PREFIX}%(filepath)s`,
      options.resume ? '--continue' : '--no-continue',
      url,
    ];

    logger().info('Starting media download', { url, formatId, destinationTemplate });
    const child = spawn(this.binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stopped = false;
    const stderrTail: string[] = [];
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (data: string) => {
      stderrTail.push(...data.split('\n').filter(line => line.trim() !== ''));
      stderrTail.splice(0, Math.max(0, stderrTail.length - STDERR_TAIL_LINES));
    });

    const exited = new Promise<ExitResult>(resolve => {
      child.once('error', error => resolve({ error }));
      child.once('close', code => resolve({ code }));
    });

    const isRunning = (): boolean => child.exitCode === null && child.signalCode === null;

    async function* events(): AsyncGenerator<MediaEvent> {
      let lastBytes = 0;
      let finished: Extract<MediaEvent, { type: 'finished' }> | undefined;
      let destination: string | undefined;

      try {
        for await (const line of createInterface({ input: child.stdout, crlfDelay: Infinity })) {
          const parsed = parseOutputLine(line);
          if (parsed === undefined) {
            continue;
          }
          if (parsed.type === 'destination') {
            destination = parsed.filePath;
          } else if (parsed.type === 'finished') {
            // Post-processing may still rename the file; report once the process exits
            finished = parsed;
          } else {
            lastBytes = parsed.bytes;
            yield parsed;
          }
        }

        const result = await exited;
        if (stopped) {
          return;
        }
        if ('error' in result) {
          throw result.error;
        }
        if (result.code !== 0) {
          throw new Error(`yt-dlp exited with code ${String(result.code)}: ${stderrTail.join(' | ')}`);
        }
        yield {
          type: 'finished',
          bytes: finished?.bytes ?? lastBytes,
          filePath: destination ?? finished?.filePath,
        };
      } finally {
        if (isRunning()) {
          child.kill('SIGTERM');
        }
      }
    }

    return {
      events: events(),
      stop: () => {
        stopped = true;
        if (isRunning()) {
          child.kill('SIGTERM');
        }
      },
    };
  }
}

export function createMediaSource(options?: YtDlpOptions): MediaSource {
  return new YtDlpMediaSource(options);
}
