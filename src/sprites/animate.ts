/**
 * Per-frame sprite animation steps
 *
 * Each step advances one animation by rate * delta and returns true on the
 * frame the animation stops by itself.
 */

import { OPACITY_MAX, OPACITY_MIN } from '../utils/constants.js';
import { clamp } from '../utils/formatting.js';
import type { AnimationKind, Sprite, StopSide } from './sprite.js';

export function advanceFade(sprite: Sprite, delta: number): boolean {
  const { fade } = sprite;
  if (!fade.active || fade.speed === 0) return false;

  const next = clamp(sprite.opacity + fade.speed * delta, OPACITY_MIN, OPACITY_MAX);
  const fadingIn = fade.speed > 0;

  if (fade.until !== null) {
    const reached = fadingIn ? next >= fade.until : next <= fade.until;
    if (reached) {
      sprite.opacity = fade.until;
      fade.active = false;
      return true;
    }
  }

  sprite.opacity = next;
  if ((fadingIn && next >= OPACITY_MAX) || (!fadingIn && next <= OPACITY_MIN)) {
    fade.active = false;
    return true;
  }
  return false;
}

export function advanceScale(sprite: Sprite, delta: number): boolean {
  const { scaling } = sprite;
  if (!scaling.active || scaling.speed === 0) return false;

  const next = sprite.scale + scaling.speed * delta;
  const growing = scaling.speed > 0;

  if (scaling.until !== null) {
    const reached = growing ? next >= scaling.until : next <= scaling.until;
    if (reached) {
      sprite.scale = scaling.until;
      scaling.active = false;
      return true;
    }
  }

  if (next <= 0) {
    sprite.scale = 0;
    scaling.active = false;
    return true;
  }

  sprite.scale = next;
  return false;
}

export function advanceRotation(sprite: Sprite, delta: number): boolean {
  const { rotating } = sprite;
  if (!rotating.active || rotating.speed === 0) return false;

  const next = sprite.rotation + rotating.speed * delta;
  const { until } = rotating;

  if (typeof until === 'number') {
    const reached = rotating.speed > 0 ? next >= until : next <= until;
    if (reached) {
      sprite.rotation = until;
      rotating.active = false;
      return true;
    }
  }

  sprite.rotation = next;
  return false;
}

function stopSatisfied(sprite: Sprite, side: StopSide, target: number): boolean {
  const { speedX, speedY } = sprite.moving;

  switch (side) {
    case 'left':
      if (speedX < 0) return sprite.left <= target;
      if (speedX > 0) return sprite.left >= target;
      return false;
    case 'right':
      if (speedX > 0) return sprite.right >= target;
      if (speedX < 0) return sprite.right <= target;
      return false;
    case 'top':
      if (speedY < 0) return sprite.top <= target;
      if (speedY > 0) return sprite.top >= target;
      return false;
    case 'bottom':
      if (speedY > 0) return sprite.bottom >= target;
      if (speedY < 0) return sprite.bottom <= target;
      return false;
  }
}

/**
 * Move by the per-axis velocity, then drop every stop condition the sprite
 * has reached. Movement ends when the last stop condition is satisfied.
 */
export function advanceMovement(sprite: Sprite, delta: number): boolean {
  const { moving } = sprite;
  if (!moving.active) return false;

  sprite.center = {
    x: sprite.center.x + moving.speedX * delta,
    y: sprite.center.y + moving.speedY * delta,
  };

  if (moving.stops.size === 0) return false;

  for (const [side, target] of [...moving.stops]) {
    if (stopSatisfied(sprite, side, target)) {
      moving.stops.delete(side);
    }
  }

  if (moving.stops.size === 0) {
    moving.active = false;
    return true;
  }
  return false;
}

/**
 * Advance every animation of a sprite
 * @returns the animations that stopped this frame
 */
export function advanceSprite(sprite: Sprite, delta: number): AnimationKind[] {
  const stopped: AnimationKind[] = [];
  if (advanceFade(sprite, delta)) stopped.push('fade');
  if (advanceMovement(sprite, delta)) stopped.push('move');
  if (advanceScale(sprite, delta)) stopped.push('scale');
  if (advanceRotation(sprite, delta)) stopped.push('rotate');
  return stopped;
}
