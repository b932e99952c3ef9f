/**
 * Sprite stage: loaded sprites by alias, visibility and per-frame animation
 */

import type { SpriteContentType } from '../container/types.js';
import { advanceSprite } from './animate.js';
import type { SpriteCache } from './cache.js';
import type { AnimationKind, Sprite, StopSide } from './sprite.js';

/** Named places on the display a moving sprite can stop at */
export const STOP_LOCATIONS = [
  'start of display',
  'end of display',
  'before start of display',
  'after end of display',
  'top of display',
  'above top of display',
  'bottom of display',
  'below bottom of display',
] as const;

export type StopLocation = (typeof STOP_LOCATIONS)[number];

export interface DisplaySize {
  width: number;
  height: number;
}

/**
 * An animation that ended this frame, with the reusable script to start
 */
export interface AnimationStopped {
  sprite: Sprite;
  animation: AnimationKind;
  script: string | null;
}

/** Draw order, back to front */
const LAYERS: readonly SpriteContentType[] = [
  'background',
  'object',
  'character',
  'dialogSprite',
];

/**
 * Edge and pixel coordinate for a named stop location
 */
export function resolveStopLocation(
  sprite: Sprite,
  location: StopLocation,
  display: DisplaySize
): [StopSide, number] {
  switch (location) {
    case 'before start of display':
      return ['left', -sprite.width];
    case 'start of display':
      return ['left', 0];
    case 'end of display':
      return ['right', display.width];
    case 'after end of display':
      return ['left', display.width];
    case 'above top of display':
      return ['top', -sprite.height];
    case 'top of display':
      return ['top', 0];
    case 'bottom of display':
      return ['bottom', display.height];
    case 'below bottom of display':
      return ['top', display.height];
  }
}

/**
 * Leading edge of the sprite's current motion, or null when it is not moving
 */
export function leadingEdge(sprite: Sprite): StopSide | null {
  const { speedX, speedY } = sprite.moving;
  if (speedX < 0) return 'left';
  if (speedX > 0) return 'right';
  if (speedY < 0) return 'top';
  if (speedY > 0) return 'bottom';
  return null;
}

export class SpriteStage {
  readonly cache: SpriteCache;
  readonly display: DisplaySize;
  private readonly loaded: Record<SpriteContentType, Map<string, Sprite>> = {
    character: new Map(),
    object: new Map(),
    background: new Map(),
    dialogSprite: new Map(),
  };

  constructor(cache: SpriteCache, display: DisplaySize) {
    this.cache = cache;
    this.display = display;
  }

  /**
   * Make a sprite the one its alias refers to
   * A replaced sprite hands over its position, flips and visibility.
   */
  register(sprite: Sprite): void {
    const aliases = this.loaded[sprite.kind];
    const previous = aliases.get(sprite.generalAlias);
    if (previous && previous !== sprite) {
      sprite.takePlaceOf(previous);
      previous.visible = false;
    }
    aliases.set(sprite.generalAlias, sprite);
  }

  get(kind: SpriteContentType, alias: string): Sprite | undefined {
    return this.loaded[kind].get(alias);
  }

  show(kind: SpriteContentType, alias: string): boolean {
    const sprite = this.get(kind, alias);
    if (!sprite) return false;
    sprite.visible = true;
    return true;
  }

  hide(kind: SpriteContentType, alias: string): boolean {
    const sprite = this.get(kind, alias);
    if (!sprite) return false;
    sprite.visible = false;
    return true;
  }

  /**
   * Hide every sprite of a kind
   * @returns number of sprites that were visible
   */
  hideAll(kind: SpriteContentType): number {
    let hidden = 0;
    for (const sprite of this.loaded[kind].values()) {
      if (sprite.visible) hidden++;
      sprite.visible = false;
    }
    return hidden;
  }

  /**
   * Visible sprites in draw order
   */
  visible(): Sprite[] {
    return LAYERS.flatMap((kind) =>
      [...this.loaded[kind].values()].filter((sprite) => sprite.visible)
    );
  }

  /**
   * Add a stop condition to a sprite's movement
   * A named location picks its own edge; a bare pixel uses the leading edge.
   * @returns false when no edge could be determined
   */
  addMovementStop(
    sprite: Sprite,
    location: StopLocation | number,
    side: StopSide | null
  ): boolean {
    if (typeof location === 'string') {
      const [edge, pixel] = resolveStopLocation(sprite, location, this.display);
      sprite.moving.stops.set(edge, pixel);
      return true;
    }

    const edge = side ?? leadingEdge(sprite);
    if (!edge) return false;
    sprite.moving.stops.set(edge, location);
    return true;
  }

  /**
   * Advance animations of every loaded sprite
   */
  update(delta: number): AnimationStopped[] {
    const stopped: AnimationStopped[] = [];
    for (const kind of LAYERS) {
      for (const sprite of this.loaded[kind].values()) {
        for (const animation of advanceSprite(sprite, delta)) {
          stopped.push({
            sprite,
            animation,
            script: sprite.afterStop[animation] ?? null,
          });
        }
      }
    }
    return stopped;
  }

  /**
   * Forget every loaded sprite and empty the caches
   */
  clear(): void {
    for (const aliases of Object.values(this.loaded)) {
      aliases.clear();
    }
    this.cache.clear();
  }
}
