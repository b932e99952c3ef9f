/**
 * Shared per-frame delta time
 */

export class AnimationClock {
  /** Seconds since the previous frame */
  delta = 0;
  /** Seconds since the story started */
  elapsed = 0;
  frames = 0;

  /**
   * Record the delta for a new frame
   */
  tick(deltaSeconds: number): void {
    this.delta = Math.max(0, deltaSeconds);
    this.elapsed += this.delta;
    this.frames++;
  }
}
