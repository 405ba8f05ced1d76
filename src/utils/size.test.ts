import { describe, it, expect } from 'vitest';
import { formatSize } from './size.js';

describe('formatSize', () => {
  it('prints bytes without decimals', () => {
    expect(formatSize(0)).toBe('0 B');
    expect(formatSize(1023)).toBe('1023 B');
  });

  it('uses binary units above a kilobyte', () => {
    expect(formatSize(1024)).toBe('1.00 KB');
    expect(formatSize(1536)).toBe('1.50 KB');
    expect(formatSize(5 * 1024 * 1024)).toBe('5.00 MB');
    expect(formatSize(3 * 1024 ** 4)).toBe('3.00 TB');
  });

  it('stops at terabytes', () => {
    expect(formatSize(2048 * 1024 ** 4)).toBe('2048.00 TB');
  });
});
