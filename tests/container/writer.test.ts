import { describe, expect, it } from 'vitest';

import { parseFooter } from '../../src/container/reader.js';
import { compileContainer, padRange } from '../../src/container/writer.js';
import { asset } from '../helpers/mocks.js';

describe('padRange', () => {
  it('pads a range to the footer half width', () => {
    expect(padRange(12, 40)).toBe('12-40' + 'X'.repeat(20));
  });

  it('keeps a single pad character after the longest range', () => {
    expect(padRange(123456789012, 12345678901)).toBe('123456789012-12345678901X');
  });

  it('refuses a range with no room for padding', () => {
    expect(() => padRange(1234567890123, 12345678901)).toThrow(
      'Header range too long for the footer: 1234567890123-12345678901'
    );
  });
});

describe('compileContainer', () => {
  it('starts with the magic and ends with a 50-character footer', () => {
    const buffer = compileContainer({});

    expect(buffer.subarray(0, 8).toString('utf-8')).toBe('VNPACK-\0');
    expect(parseFooter(buffer.subarray(buffer.length - 50).toString('utf-8'))).not.toBeNull();
  });

  it('writes a detail header with every script section', () => {
    const buffer = compileContainer({ variables: { score: '1' } });
    const footer = parseFooter(buffer.subarray(buffer.length - 50).toString('utf-8'));
    const detail = footer ? buffer.subarray(footer.detail.from, footer.detail.to).toString('utf-8') : '';

    expect(JSON.parse(detail)).toEqual({
      StoryStartScript: {},
      StoryScript: {},
      StoryReusables: {},
      StoryVariables: { score: '1' },
      FontSpriteProperties: {},
    });
  });

  it('records asset locations with their extensions', () => {
    const buffer = compileContainer({ assets: { music: { theme: asset('MUSIC', '.ogg') } } });
    const footer = parseFooter(buffer.subarray(buffer.length - 50).toString('utf-8'));
    const detail = footer ? buffer.subarray(footer.detail.from, footer.detail.to).toString('utf-8') : '{}';

    expect(JSON.parse(detail).StoryMusic_Locations).toEqual({ theme: ['8-13', '.ogg'] });
    expect(buffer.subarray(8, 13).toString('utf-8')).toBe('MUSIC');
  });

  it('orders the header ranges after the assets and before the footer', () => {
    const buffer = compileContainer({
      assets: { audio: { click: asset('CLICK', '.ogg') } },
      general: { StoryInfo: { Title: 'Ordered' } },
    });
    const footer = parseFooter(buffer.subarray(buffer.length - 50).toString('utf-8'));
    if (!footer) throw new Error('footer did not parse');

    expect(footer.detail.from).toBe(13);
    expect(footer.detail.from).toBeLessThan(footer.detail.to);
    expect(footer.detail.to).toBeLessThanOrEqual(footer.general.from);
    expect(footer.general.from).toBeLessThan(footer.general.to);
    expect(footer.general.to).toBeLessThanOrEqual(buffer.length);
  });

  it('places the general header right after the detail header', () => {
    const buffer = compileContainer({ general: { StoryEngineVersion: '1.0' } });
    const footer = parseFooter(buffer.subarray(buffer.length - 50).toString('utf-8'));

    expect(footer?.general.from).toBe(footer?.detail.to);
    expect(footer?.general.to).toBe(buffer.length - 50);
  });
});
