import { describe, expect, it } from 'vitest';

import { clamp, formatSize, previewLine, roundTo } from '../../src/utils/formatting.js';

describe('formatSize', () => {
  it('formats bytes', () => {
    expect(formatSize(999)).toBe('999 bytes');
  });

  it('formats kilobytes', () => {
    expect(formatSize(1500)).toBe('1.5K bytes');
  });

  it('formats megabytes', () => {
    expect(formatSize(2500000)).toBe('2.5M bytes');
  });
});

describe('previewLine', () => {
  it('joins line breaks and trims', () => {
    expect(previewLine('  Hello\r\nthere  ')).toBe('Hello there');
  });

  it('cuts long lines', () => {
    expect(previewLine('x'.repeat(60))).toBe('x'.repeat(50) + '...');
    expect(previewLine('abcdef', 3)).toBe('abc...');
  });
});

describe('clamp', () => {
  it('keeps values inside the range', () => {
    expect(clamp(5, 0, 10)).toBe(5);
    expect(clamp(-1, 0, 10)).toBe(0);
    expect(clamp(11, 0, 10)).toBe(10);
  });
});

describe('roundTo', () => {
  it('rounds to the given places', () => {
    expect(roundTo(0.01 + 9 * 0.01, 4)).toBe(0.1);
    expect(roundTo(1.23456, 2)).toBe(1.23);
  });
});
