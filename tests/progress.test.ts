import { describe, it, expect } from 'vitest';
import { ProgressTracker } from '../src/transfer/progress.js';
import { formatBytes, formatDuration, formatProgressLine, formatSpeed } from '../src/utils/format.js';

describe('ProgressTracker', () => {
  it('should compute percent, speed and eta against a known total', () => {
    const tracker = new ProgressTracker({ total: 1000, startedAt: 0 });

    expect(tracker.observe(250, 500)).toEqual({
      bytes: 250,
      total: 1000,
      speed: 500,
      percent: 25,
      eta: 1.5,
      timestamp: 500,
    });
  });

  it('should measure speed over the latest interval only', () => {
    const tracker = new ProgressTracker({ total: 1000, startedAt: 0 });
    tracker.observe(100, 1000);

    const sample = tracker.observe(600, 1500);

    expect(sample.speed).toBe(1000);
    expect(sample.eta).toBe(0.4);
  });

  it('should start from bytes already on disk', () => {
    const tracker = new ProgressTracker({ total: 1000, initialBytes: 400, startedAt: 0 });

    const sample = tracker.observe(500, 1000);

    expect(sample.speed).toBe(100);
    expect(sample.percent).toBe(50);
  });

  it('should keep the previous speed when no time has passed', () => {
    const tracker = new ProgressTracker({ total: 1000, startedAt: 0 });
    tracker.observe(100, 1000);

    expect(tracker.observe(200, 1000).speed).toBe(100);
    // the 200 bytes since t=1000 land in the next interval
    expect(tracker.observe(300, 2000).speed).toBe(200);
  });

  it('should leave percent and eta unset for an unknown total', () => {
    const tracker = new ProgressTracker({ startedAt: 0 });

    expect(tracker.observe(300, 1000)).toEqual({ bytes: 300, total: 0, speed: 300, timestamp: 1000 });
  });

  it('should leave eta unset while the speed is zero', () => {
    const tracker = new ProgressTracker({ total: 1000, startedAt: 0 });

    const sample = tracker.observe(0, 1000);

    expect(sample.percent).toBe(0);
    expect(sample.eta).toBeUndefined();
  });

  it('should reject bytes that go backwards', () => {
    const tracker = new ProgressTracker({ total: 1000, startedAt: 0 });
    tracker.observe(500, 1000);

    expect(() => tracker.observe(400, 2000)).toThrow('Byte count went backwards: 400 after 500');
  });

  it('should reject bytes beyond a strict total', () => {
    const tracker = new ProgressTracker({ total: 1000, startedAt: 0 });

    expect(() => tracker.observe(1001, 1000)).toThrow('Source sent 1001 bytes but declared 1000');
  });

  it('should grow an estimated total to what was observed', () => {
    const tracker = new ProgressTracker({ total: 1000, startedAt: 0, totalPolicy: 'estimate' });

    const sample = tracker.observe(1200, 1000);

    expect(sample.total).toBe(1200);
    expect(sample.percent).toBe(100);
    expect(tracker.declaredTotal).toBe(1200);
  });

  it('should treat invalid totals as unknown', () => {
    const tracker = new ProgressTracker({ total: Number.NaN, startedAt: 0 });
    expect(tracker.declaredTotal).toBe(0);

    tracker.setTotal(-5);
    expect(tracker.declaredTotal).toBe(0);

    tracker.setTotal(2048);
    expect(tracker.declaredTotal).toBe(2048);
  });
});

describe('format', () => {
  it('should format byte counts with binary units', () => {
    expect(formatBytes(0)).toBe('0.00 B');
    expect(formatBytes(1023)).toBe('1023.00 B');
    expect(formatBytes(1024)).toBe('1.00 KB');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(1024 * 1024)).toBe('1.00 MB');
    expect(formatBytes(3 * 1024 ** 3)).toBe('3.00 GB');
    expect(formatBytes(1024 ** 5)).toBe('1.00 PB');
  });

  it('should format durations in whole seconds', () => {
    expect(formatDuration(3723)).toBe('1h 2m 3s');
    expect(formatDuration(123)).toBe('2m 3s');
    expect(formatDuration(5.9)).toBe('5s');
    expect(formatDuration(0)).toBe('0s');
    expect(formatDuration(undefined)).toBe('N/A');
    expect(formatDuration(Number.POSITIVE_INFINITY)).toBe('N/A');
  });

  it('should format speed', () => {
    expect(formatSpeed(2048)).toBe('2.00 KB/s');
    expect(formatSpeed(0)).toBe('N/A');
  });

  it('should render a progress line with a known total', () => {
    expect(
      formatProgressLine({ bytes: 450, total: 1000, speed: 100, percent: 45, eta: 5.5, timestamp: 0 })
    ).toBe('45.0% | 450.00 B / 1000.00 B | 100.00 B/s | ETA: 5s');
  });

  it('should render a progress line without a total', () => {
    expect(formatProgressLine({ bytes: 450, total: 0, speed: 0, timestamp: 0 })).toBe('450.00 B | N/A');
  });
});
