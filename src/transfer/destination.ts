import { basename, resolve } from 'path';
import { extension as mimeExtension } from 'mime-types';
import { parseHttpUrl } from '../http/probe.js';

const DEFAULT_BASENAME = 'downloaded_file';

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * File name for a URL with no explicit destination: the last path segment,
 * or `downloaded_file` with an extension guessed from the content type.
 */
export function inferFileName(url: string, contentKind?: string): string {
  const pathname = parseHttpUrl(url)?.pathname ?? url.split('?')[0];
  const name = basename(decodeSegment(pathname));
  if (name !== '' && name !== '.' && name !== '..') {
    return name;
  }
  const extension = contentKind ? mimeExtension(contentKind) : false;
  return extension ? `${DEFAULT_BASENAME}.${extension}` : DEFAULT_BASENAME;
}

/**
 * Paths currently written by a running session in this process.
 */
export class DestinationRegistry {
  private readonly active = new Set<string>();

  public claim(path: string): boolean {
    const key = resolve(path);
    if (this.active.has(key)) {
      return false;
    }
    this.active.add(key);
    return true;
  }

  public release(path: string): void {
    this.active.delete(resolve(path));
  }

  public isActive(path: string): boolean {
    return this.active.has(resolve(path));
  }
}

export const sharedDestinations = new DestinationRegistry();
