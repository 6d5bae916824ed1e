export * from './types.js';
export { selectProgressiveFormats, formatLabel, resolveFormatSelector, isOutputTemplate } from './formats.js';
export { MediaByteCounter } from './counter.js';
export { YtDlpMediaSource, createMediaSource, parseOutputLine } from './ytdlp.js';
export type { OutputLine, YtDlpOptions } from './ytdlp.js';
