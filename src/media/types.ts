export interface MediaFormat {
  id: string;
  height?: number;
  fps?: number;
  container: string;
  note: string;
}

export type MediaEvent =
  | {
      type: 'downloading';
      bytes: number;
      /** 0 when the source has neither an exact size nor an estimate */
      total: number;
      estimated: boolean;
      filePath?: string;
    }
  | { type: 'finished'; bytes: number; filePath?: string };

export interface MediaFetchOptions {
  /** Continue a partial download the source left behind */
  resume: boolean;
}

export interface MediaDownload {
  events: AsyncIterable<MediaEvent>;
  /** Ask the source to stop; partial output stays on disk */
  stop(): void;
}

export interface MediaSource {
  /** Empty when the formats cannot be listed */
  listFormats(url: string): Promise<MediaFormat[]>;
  fetch(url: string, formatId: string, destinationTemplate: string, options: MediaFetchOptions): MediaDownload;
}
