import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  formatDuration,
  formatTimestamp,
  printDialog,
  printPlayer,
  printPlayerInfo,
  stripAnsi,
  timestampPrefix,
} from '../../src/output/colors.js';

describe('stripAnsi', () => {
  it('removes ANSI color codes', () => {
    const colored = '\x1b[31mRed Text\x1b[0m';
    expect(stripAnsi(colored)).toBe('Red Text');
  });

  it('handles multiple color codes', () => {
    const colored = '\x1b[1m\x1b[34mBold Blue\x1b[0m';
    expect(stripAnsi(colored)).toBe('Bold Blue');
  });

  it('returns plain text unchanged', () => {
    expect(stripAnsi('Plain text')).toBe('Plain text');
  });
});

describe('formatDuration', () => {
  it('formats milliseconds', () => {
    expect(formatDuration(500)).toBe('500ms');
  });

  it('formats seconds', () => {
    expect(formatDuration(2500)).toBe('2.5s');
  });

  it('formats minutes and seconds', () => {
    expect(formatDuration(125000)).toBe('2m5s');
  });

  it('formats hours', () => {
    expect(formatDuration(3723000)).toBe('1h2m3s');
  });
});

describe('formatTimestamp', () => {
  it('formats local time as HH:MM:SS.mmm', () => {
    expect(formatTimestamp(new Date(2024, 0, 15, 9, 5, 3, 42))).toBe('09:05:03.042');
  });

  it('uses current time when no date provided', () => {
    expect(formatTimestamp()).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3}$/);
  });
});

describe('timestampPrefix', () => {
  it('stripping ANSI leaves just timestamp and space', () => {
    expect(stripAnsi(timestampPrefix())).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} $/);
  });
});

describe('print helpers', () => {
  let consoleSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  function printed(): string {
    return stripAnsi(String(consoleSpy.mock.calls[0]?.[0]));
  }

  it('prints player messages with a [PLAYER] label', () => {
    printPlayer('Scene loaded');

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    expect(printed()).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} \[PLAYER\] Scene loaded$/);
    expect(String(consoleSpy.mock.calls[0]?.[0])).toContain('\x1b[35m[PLAYER]');
  });

  it('prints info messages dimmed', () => {
    printPlayerInfo('Window: 640x480');

    expect(printed()).toMatch(/ \[PLAYER\] Window: 640x480$/);
    expect(String(consoleSpy.mock.calls[0]?.[0])).toContain('\x1b[2m[PLAYER]');
  });

  it('prints dialog with a [STORY] label', () => {
    printDialog('Hello there');

    expect(printed()).toMatch(/ \[STORY\] Hello there$/);
  });
});
