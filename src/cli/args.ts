import type { TransferRequest } from '../transfer/types.js';

export const USAGE = `
Resumable file and media downloader

Usage:
  transfer <url> [options]
  transfer --list-formats <url>

Options:
  -o, --output <path>     Destination file (inferred from the URL when omitted)
  --no-resume             Start over instead of extending a partial file
  --media                 Download through the media extractor (alias: --youtube)
  -q, --quality <choice>  Media format: best, worst, 720p, or a format id
  --list-formats          List the progressive media formats for <url>
  -v, --verbose           Log debug detail to stderr
  --log-file <path>       Also write JSON logs to this file
  -h, --help              Show this help

Controls while downloading (terminal only):
  p                       Pause / resume
  c, Ctrl-C               Cancel, keeping the partial file

Examples:
  transfer https://example.com/archive.zip
  transfer https://example.com/archive.zip -o backups/archive.zip --no-resume
  transfer --media -q 720p https://video.example.com/watch?v=abc
`;

export interface LoggingOptions {
  verbose: boolean;
  file?: string;
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'list-formats'; url: string; logging: LoggingOptions }
  | { kind: 'transfer'; request: TransferRequest; logging: LoggingOptions }
  | { kind: 'error'; message: string };

const VALUE_FLAGS: Record<string, 'output' | 'quality' | 'logFile'> = {
  '-o': 'output',
  '--output': 'output',
  '-q': 'quality',
  '--quality': 'quality',
  '--log-file': 'logFile',
};

export function parseArgs(argv: string[]): CliCommand {
  const positionals: string[] = [];
  const values: { output?: string; quality?: string; logFile?: string } = {};
  let verbose = false;
  let resume = true;
  let media = false;
  let listFormats = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }
    if (arg === '--no-resume') {
      resume = false;
      continue;
    }
    if (arg === '--media' || arg === '--youtube') {
      media = true;
      continue;
    }
    if (arg === '--list-formats') {
      listFormats = true;
      continue;
    }
    if (arg === '-v' || arg === '--verbose') {
      verbose = true;
      continue;
    }

    const [flag, inline] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];
    const key = VALUE_FLAGS[flag];
    if (key !== undefined) {
      const value = inline ?? argv[++i];
      if (value === undefined || value === '') {
        return { kind: 'error', message: `Option ${flag} needs a value` };
      }
      values[key] = value;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      return { kind: 'error', message: `Unknown option: ${arg}` };
    }
    positionals.push(arg);
  }

  if (positionals.length === 0) {
    return { kind: 'error', message: 'Missing <url>' };
  }
  if (positionals.length > 1) {
    return { kind: 'error', message: `Unexpected argument: ${positionals[1]}` };
  }

  const url = positionals[0];
  const logging: LoggingOptions = { verbose, file: values.logFile };
  if (listFormats) {
    return { kind: 'list-formats', url, logging };
  }

  return {
    kind: 'transfer',
    request: {
      url,
      destination: values.output,
      resume,
      mode: media ? 'media' : 'file',
      quality: values.quality,
    },
    logging,
  };
}
