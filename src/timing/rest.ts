/**
 * Rest gate: pauses the main reader for a number of seconds
 */

import type { AnimationClock } from './clock.js';

export class RestGate {
  private readonly clock: AnimationClock;
  accumulated = 0;
  target = 0;

  constructor(clock: AnimationClock) {
    this.clock = clock;
  }

  /**
   * Start a rest, or extend the one still counting
   */
  setup(seconds: number): void {
    const counting = this.target > 0 && this.accumulated > 0;
    if (counting && this.accumulated <= this.target) {
      this.target += seconds;
      return;
    }
    this.target = seconds;
    this.accumulated = 0;
  }

  /**
   * Advance by the frame delta
   * @returns whether the reader must stay paused this frame
   */
  tick(): boolean {
    if (this.target <= 0) return false;

    if (this.accumulated >= this.target) {
      this.reset();
      return false;
    }

    this.accumulated += this.clock.delta;
    return true;
  }

  pauseRequired(): boolean {
    return this.target > 0;
  }

  reset(): void {
    this.accumulated = 0;
    this.target = 0;
  }
}
