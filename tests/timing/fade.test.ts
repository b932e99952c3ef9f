import { beforeEach, describe, expect, it, vi } from 'vitest';

import { AnimationClock } from '../../src/timing/clock.js';
import { type FadeRequest, ScreenFade } from '../../src/timing/fade.js';

function request(overrides: Partial<FadeRequest> = {}): FadeRequest {
  return {
    color: '#112233',
    initialOpacity: 0,
    fadeInRate: 255,
    fadeOutRate: 255,
    holdSeconds: 0.5,
    ...overrides,
  };
}

describe('ScreenFade', () => {
  let clock: AnimationClock;
  let fade: ScreenFade;

  beforeEach(() => {
    clock = new AnimationClock();
    fade = new ScreenFade(clock);
  });

  function frame(delta: number): void {
    clock.tick(delta);
    fade.update();
  }

  it('draws nothing while idle', () => {
    expect(fade.draw()).toBeNull();
    expect(fade.active).toBe(false);
  });

  it('fades in, holds, calls back once, then fades out', () => {
    const onHoldExpired = vi.fn();
    expect(fade.start(request({ onHoldExpired }))).toBe(true);

    frame(0.5);
    expect(fade.draw()).toEqual({ color: '#112233', opacity: 127.5 });
    expect(fade.busy).toBe(true);

    frame(0.5);
    expect(fade.opacity).toBe(255);
    expect(fade.busy).toBe(false);

    frame(0.25);
    expect(onHoldExpired).not.toHaveBeenCalled();

    // Hold elapsed is 0.75 > 0.5: callback, then fading out in the same frame
    frame(0.5);
    expect(onHoldExpired).toHaveBeenCalledTimes(1);
    expect(fade.state).toBe('fading-out');
    expect(fade.opacity).toBe(127.5);

    frame(0.5);
    expect(fade.state).toBe('idle');
    expect(fade.draw()).toBeNull();
    expect(onHoldExpired).toHaveBeenCalledTimes(1);
  });

  it('refuses to start while a fade is busy', () => {
    fade.start(request());
    frame(0.1);

    expect(fade.start(request({ color: '#ffffff' }))).toBe(false);
    expect(fade.color).toBe('#112233');
  });

  it('clamps the initial opacity', () => {
    fade.start(request({ initialOpacity: 400 }));

    expect(fade.opacity).toBe(255);
    expect(fade.busy).toBe(false);
    expect(fade.active).toBe(true);
  });
});
