import type { ProgressSample } from '../transfer/types.js';

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatBytes(bytes: number): string {
  let value = bytes;
  for (const unit of BYTE_UNITS) {
    if (value < 1024) {
      return `${value.toFixed(2)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(2)} PB`;
}

/**
 * Whole-second duration such as `1h 2m 3s`; undefined or non-finite renders as `N/A`.
 */
export function formatDuration(seconds: number | undefined): string {
  if (seconds === undefined || !Number.isFinite(seconds)) {
    return 'N/A';
  }
  const total = Math.floor(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  if (h > 0) {
    return `${h}h ${m}m ${s}s`;
  }
  if (m > 0) {
    return `${m}m ${s}s`;
  }
  return `${s}s`;
}

export function formatSpeed(bytesPerSecond: number): string {
  return bytesPerSecond > 0 ? `${formatBytes(bytesPerSecond)}/s` : 'N/A';
}

export function formatProgressLine(sample: ProgressSample): string {
  const speed = formatSpeed(sample.speed);
  if (sample.total > 0 && sample.percent !== undefined) {
    return `${sample.percent.toFixed(1)}% | ${formatBytes(sample.bytes)} / ${formatBytes(sample.total)} | ${speed} | ETA: ${formatDuration(sample.eta)}`;
  }
  return `${formatBytes(sample.bytes)} | ${speed}`;
}
