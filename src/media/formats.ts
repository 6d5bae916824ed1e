import { MediaFormat } from './types.js';

const PROGRESSIVE_CONTAINERS = new Set(['mp4', 'webm', 'mkv']);

export interface RawFormat {
  format_id?: unknown;
  ext?: unknown;
  vcodec?: unknown;
  acodec?: unknown;
  height?: unknown;
  fps?: unknown;
  format_note?: unknown;
}

function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Keeps formats that carry both audio and video in a common container, so a
 * single file comes out without a merge step.
 */
export function selectProgressiveFormats(info: unknown): MediaFormat[] {
  if (!isRecord(info) || !Array.isArray(info.formats)) {
    return [];
  }

  const formats: MediaFormat[] = [];
  for (const raw of info.formats) {
    if (!isRecord(raw)) {
      continue;
    }
    const format: RawFormat = raw;
    const id = asString(format.format_id);
    const container = asString(format.ext);
    if (id === undefined || container === undefined || !PROGRESSIVE_CONTAINERS.has(container)) {
      continue;
    }
    if (format.vcodec === 'none' || format.acodec === 'none') {
      continue;
    }
    formats.push({
      id,
      container,
      height: asNumber(format.height),
      fps: asNumber(format.fps),
      note: asString(format.format_note) ?? '',
    });
  }
  return formats;
}

export function formatLabel(format: MediaFormat): string {
  const height = format.height !== undefined ? `${format.height}p` : 'audio';
  return [`${format.id} -`, height, format.note, format.container].filter(part => part !== '').join(' ');
}

/**
 * Turns a user-facing quality choice into a format selector:
 * `720p` caps the height, a label such as `22 - 720p mp4` picks format 22,
 * and anything else (`best`, `worst`, a raw selector) passes through.
 */
export function resolveFormatSelector(quality: string | undefined, fallback: string): string {
  const trimmed = quality?.trim() ?? '';
  if (trimmed === '') {
    return fallback;
  }

  const height = /^(\d+)p$/i.exec(trimmed);
  if (height) {
    return `best[height<=${height[1]}]`;
  }

  const label = /^(\d+)\s+-\s/.exec(trimmed);
  if (label) {
    return label[1];
  }

  return trimmed;
}

/** True when the path still holds `%(field)s` placeholders for the extractor to fill. */
export function isOutputTemplate(path: string): boolean {
  return /%\([^)]+\)/.test(path);
}
