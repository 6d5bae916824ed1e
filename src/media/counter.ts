import type { MediaEvent } from './types.js';

type DownloadingEvent = Extract<MediaEvent, { type: 'downloading' }>;

/**
 * Folds per-file progress into one running count. A merged selector makes the
 * extractor fetch several files in a row, each counted again from zero.
 */
export class MediaByteCounter {
  private settled = 0;
  private file: string | undefined;
  private current = 0;

  /** Overall bytes and estimated total after this event; total 0 stays unknown. */
  public add(event: DownloadingEvent): { bytes: number; total: number } {
    const switched = event.filePath !== undefined && this.file !== undefined && event.filePath !== this.file;
    if (switched || event.bytes < this.current) {
      this.settled += this.current;
      this.current = 0;
    }
    this.file = event.filePath ?? this.file;
    this.current = event.bytes;

    return {
      bytes: this.settled + event.bytes,
      total: event.total > 0 ? this.settled + event.total : 0,
    };
  }

  /** Overall bytes once the last file reports `bytes`. */
  public finish(bytes: number): number {
    return this.settled + Math.max(bytes, this.current);
  }
}
