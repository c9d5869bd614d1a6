import { describe, expect, it } from 'vitest';
import { formatFileSize } from '../mediaFormatters';
import { formatLoopPoint } from '../timeFormatters';

describe('formatLoopPoint', () => {
  it('renders minutes, seconds and tenths', () => {
    expect(formatLoopPoint(5)).toBe('0:05.0');
    expect(formatLoopPoint(125.44)).toBe('2:05.4');
  });

  it('carries rounded tenths into the next minute', () => {
    expect(formatLoopPoint(59.96)).toBe('1:00.0');
  });

  it('shows a placeholder for unset points', () => {
    expect(formatLoopPoint(null)).toBe('--:--.-');
    expect(formatLoopPoint(Number.NaN)).toBe('--:--.-');
  });
});

describe('formatFileSize', () => {
  it('formats bytes and binary multiples', () => {
    expect(formatFileSize(512)).toBe('512 B');
    expect(formatFileSize(2048)).toBe('2.0 KB');
    expect(formatFileSize(1572864)).toBe('1.5 MB');
    expect(formatFileSize(40 * 1024)).toBe('40 KB');
  });

  it('returns null for empty or invalid sizes', () => {
    expect(formatFileSize(0)).toBeNull();
    expect(formatFileSize(undefined)).toBeNull();
  });
});
