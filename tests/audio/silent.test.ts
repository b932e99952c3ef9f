import { describe, expect, it, vi } from 'vitest';

import { createSilentOutput } from '../../src/audio/silent.js';

describe('createSilentOutput', () => {
  it('reports each action', () => {
    const onEvent = vi.fn();
    const sound = createSilentOutput(onEvent).load('theme', Buffer.alloc(12));

    sound.setVolume(0.5);
    sound.play(true);
    sound.stop();

    expect(onEvent.mock.calls.map(([event]) => event)).toEqual([
      { action: 'load', name: 'theme', detail: '12 bytes' },
      { action: 'volume', name: 'theme', detail: '0.5' },
      { action: 'play', name: 'theme', detail: 'loop' },
      { action: 'stop', name: 'theme' },
    ]);
  });

  it('tracks whether a sound is playing', () => {
    const sound = createSilentOutput().load('click', Buffer.alloc(1));

    expect(sound.isPlaying()).toBe(false);
    sound.play(false);
    expect(sound.isPlaying()).toBe(true);
    sound.stop();
    expect(sound.isPlaying()).toBe(false);
  });

  it('reports a stop only for a playing sound', () => {
    const onEvent = vi.fn();
    const sound = createSilentOutput(onEvent).load('click', Buffer.alloc(1));

    sound.stop();

    expect(onEvent).toHaveBeenCalledTimes(1);
  });
});
