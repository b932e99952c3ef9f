import { describe, expect, it } from 'vitest';

import {
  ArgReader,
  InvalidNumberError,
  clampDuration,
  parseDecimal,
  parseInteger,
  toKeyword,
} from '../../src/script/fields.js';

describe('parseDecimal', () => {
  it('parses decimals and exponents', () => {
    expect(parseDecimal('1.5')).toBe(1.5);
    expect(parseDecimal(' -.25 ')).toBe(-0.25);
    expect(parseDecimal('2e2')).toBe(200);
    expect(parseDecimal('3.')).toBe(3);
  });

  it('rejects blanks and words', () => {
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal('abc')).toBeNull();
    expect(parseDecimal('0x10')).toBeNull();
    expect(parseDecimal('Infinity')).toBeNull();
  });
});

describe('parseInteger', () => {
  it('parses signed integers', () => {
    expect(parseInteger('+7')).toBe(7);
    expect(parseInteger('-12')).toBe(-12);
  });

  it('rejects decimals', () => {
    expect(parseInteger('1.5')).toBeNull();
  });
});

describe('clampDuration', () => {
  it('keeps durations inside 0.01..100 seconds', () => {
    expect(clampDuration(0)).toBe(0.01);
    expect(clampDuration(2.5)).toBe(2.5);
    expect(clampDuration(500)).toBe(100);
  });
});

describe('toKeyword', () => {
  it('matches case-insensitively', () => {
    expect(toKeyword(' Fade In ', ['fade in', 'fade out'])).toBe('fade in');
  });

  it('returns unknown for anything else', () => {
    expect(toKeyword('sideways', ['left', 'right'])).toBe('unknown');
  });
});

describe('ArgReader', () => {
  const reader = new ArgReader(['7', 'x', '0.005', 'a', 'b']);

  it('reads typed values by position', () => {
    expect(reader.count).toBe(5);
    expect(reader.int(0)).toBe(7);
    expect(reader.float(0)).toBe(7);
    expect(reader.duration(2)).toBe(0.01);
    expect(reader.str(9)).toBe('');
  });

  it('throws with the 1-based position of a bad number', () => {
    expect(() => reader.int(1)).toThrow(InvalidNumberError);
    expect(() => reader.int(1)).toThrow('Argument 2 must be an integer, got "x"');
    expect(() => reader.float(3)).toThrow('Argument 4 must be a number, got "a"');
  });

  it('rejoins the remaining arguments', () => {
    expect(reader.rest(3)).toBe('a, b');
  });
});
