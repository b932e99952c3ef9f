/**
 * Full-screen colour fade used for scene transitions
 *
 * Fades in to full opacity, holds, calls back once, then fades out.
 */

import { OPACITY_MAX, OPACITY_MIN } from '../utils/constants.js';
import type { AnimationClock } from './clock.js';

export type FadeState = 'idle' | 'fading-in' | 'fading-out';

export interface FadeRequest {
  /** Overlay colour, e.g. "#000000" */
  color: string;
  initialOpacity: number;
  /** Opacity units per second */
  fadeInRate: number;
  fadeOutRate: number;
  holdSeconds: number;
  /** Runs once, when the hold at full opacity ends */
  onHoldExpired?: (() => void) | undefined;
}

/**
 * What to draw this frame
 */
export interface FadeOverlay {
  color: string;
  opacity: number;
}

export class ScreenFade {
  private readonly clock: AnimationClock;
  state: FadeState = 'idle';
  opacity = OPACITY_MIN;
  color = '#000000';
  private fadeInRate = 0;
  private fadeOutRate = 0;
  private holdSeconds = 0;
  private holdElapsed = 0;
  private onHoldExpired: (() => void) | null = null;

  constructor(clock: AnimationClock) {
    this.clock = clock;
  }

  /**
   * Whether a fade is still on its way in or out
   */
  get busy(): boolean {
    return (
      (this.state === 'fading-in' && this.opacity < OPACITY_MAX) ||
      (this.state === 'fading-out' && this.opacity > OPACITY_MIN)
    );
  }

  get active(): boolean {
    return this.state !== 'idle';
  }

  /**
   * Begin a fade
   * @returns false (and changes nothing) when a fade is already in progress
   */
  start(request: FadeRequest): boolean {
    if (this.busy) return false;

    this.state = 'fading-in';
    this.color = request.color;
    this.opacity = Math.min(Math.max(request.initialOpacity, OPACITY_MIN), OPACITY_MAX);
    this.fadeInRate = request.fadeInRate;
    this.fadeOutRate = request.fadeOutRate;
    this.holdSeconds = request.holdSeconds;
    this.holdElapsed = 0;
    this.onHoldExpired = request.onHoldExpired ?? null;
    return true;
  }

  /**
   * Advance by the frame delta
   */
  update(): void {
    const { delta } = this.clock;

    if (this.state === 'fading-in') {
      if (this.opacity < OPACITY_MAX) {
        this.opacity = Math.min(this.opacity + this.fadeInRate * delta, OPACITY_MAX);
        return;
      }

      this.holdElapsed += delta;
      if (this.holdElapsed > this.holdSeconds) {
        const callback = this.onHoldExpired;
        this.onHoldExpired = null;
        callback?.();
        this.state = 'fading-out';
        this.update();
      }
      return;
    }

    if (this.state === 'fading-out') {
      this.opacity = Math.max(this.opacity - this.fadeOutRate * delta, OPACITY_MIN);
      if (this.opacity <= OPACITY_MIN) {
        this.state = 'idle';
      }
    }
  }

  /**
   * Overlay to draw, or null while idle
   */
  draw(): FadeOverlay | null {
    if (this.state === 'idle') return null;
    return { color: this.color, opacity: this.opacity };
  }
}
