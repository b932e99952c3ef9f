/**
 * Sprite instances decoded from container assets
 */

import type { DecodedImage } from '../container/decode.js';
import type {
  FontSpriteProperties,
  LetterRect,
  SpriteContentType,
} from '../container/types.js';

export type AnimationKind = 'fade' | 'move' | 'scale' | 'rotate';

export type StopSide = 'left' | 'right' | 'top' | 'bottom';

export interface FadeAnimation {
  active: boolean;
  /** Opacity units per second, negative when fading out */
  speed: number;
  until: number | null;
}

export interface ScaleAnimation {
  active: boolean;
  /** Scale units per second, negative when shrinking */
  speed: number;
  until: number | null;
}

export interface RotateAnimation {
  active: boolean;
  /** Degrees per second, negative counterclockwise */
  speed: number;
  until: number | 'forever' | null;
}

export interface MoveAnimation {
  active: boolean;
  /** Pixels per second; negative x moves left, negative y moves up */
  speedX: number;
  speedY: number;
  /** Edge of the sprite -> pixel coordinate it must reach */
  stops: Map<StopSide, number>;
}

/**
 * A decoded sprite plus its presentation state
 */
export class Sprite {
  readonly kind: SpriteContentType;
  /** Asset name in the container */
  readonly sourceName: string;
  /** Name the sprite was loaded as (differs from sourceName for fresh copies) */
  name: string;
  /** Alias the script refers to this sprite by */
  generalAlias: string;
  readonly image: DecodedImage;

  visible = false;
  center = { x: 0, y: 0 };
  flipHorizontal = false;
  flipVertical = false;
  opacity = 255;
  scale = 1;
  rotation = 0;

  fade: FadeAnimation = { active: false, speed: 0, until: null };
  scaling: ScaleAnimation = { active: false, speed: 0, until: null };
  rotating: RotateAnimation = { active: false, speed: 0, until: null };
  moving: MoveAnimation = { active: false, speedX: 0, speedY: 0, stops: new Map() };

  /** Reusable script to start when an animation stops */
  afterStop: Partial<Record<AnimationKind, string>> = {};

  constructor(
    kind: SpriteContentType,
    name: string,
    image: DecodedImage,
    generalAlias: string
  ) {
    this.kind = kind;
    this.sourceName = name;
    this.name = name;
    this.image = image;
    this.generalAlias = generalAlias;
  }

  get width(): number {
    return this.image.width * this.scale;
  }

  get height(): number {
    return this.image.height * this.scale;
  }

  get left(): number {
    return this.center.x - this.width / 2;
  }

  get right(): number {
    return this.center.x + this.width / 2;
  }

  get top(): number {
    return this.center.y - this.height / 2;
  }

  get bottom(): number {
    return this.center.y + this.height / 2;
  }

  /**
   * Carry position, flips and visibility over from the sprite this one replaces
   */
  takePlaceOf(previous: Sprite): void {
    this.center = { ...previous.center };
    this.flipHorizontal = previous.flipHorizontal;
    this.flipVertical = previous.flipVertical;
    this.visible = previous.visible;
  }

  /**
   * Whether the given animation (or any, when omitted) is running
   */
  isAnimating(kind?: AnimationKind): boolean {
    switch (kind) {
      case 'fade':
        return this.fade.active;
      case 'move':
        return this.moving.active;
      case 'scale':
        return this.scaling.active;
      case 'rotate':
        return this.rotating.active;
      default:
        return (
          this.fade.active ||
          this.moving.active ||
          this.scaling.active ||
          this.rotating.active
        );
    }
  }
}

export class Character extends Sprite {
  constructor(name: string, image: DecodedImage, generalAlias: string) {
    super('character', name, image, generalAlias);
  }
}

export class SpriteObject extends Sprite {
  constructor(name: string, image: DecodedImage, generalAlias: string) {
    super('object', name, image, generalAlias);
  }
}

export class DialogSprite extends Sprite {
  constructor(name: string, image: DecodedImage, generalAlias: string) {
    super('dialogSprite', name, image, generalAlias);
  }
}

/** Backgrounds share one alias: only one is shown at a time */
export const BACKGROUND_ALIAS = 'fixed_alias';

export class Background extends Sprite {
  constructor(name: string, image: DecodedImage) {
    super('background', name, image, BACKGROUND_ALIAS);
  }
}

/**
 * Construct the sprite class for a content type
 */
export function createSprite(
  kind: SpriteContentType,
  name: string,
  image: DecodedImage,
  generalAlias: string
): Sprite {
  switch (kind) {
    case 'character':
      return new Character(name, image, generalAlias);
    case 'object':
      return new SpriteObject(name, image, generalAlias);
    case 'dialogSprite':
      return new DialogSprite(name, image, generalAlias);
    case 'background':
      return new Background(name, image);
  }
}

/**
 * A font sprite sheet and the layout of its letters
 */
export class FontSprite {
  readonly name: string;
  readonly sheet: DecodedImage;
  readonly properties: FontSpriteProperties;

  constructor(
    name: string,
    sheet: DecodedImage,
    properties: FontSpriteProperties
  ) {
    this.name = name;
    this.sheet = sheet;
    this.properties = properties;
  }

  /**
   * Rectangle of a letter on the sheet, or null when the sheet lacks it
   */
  letter(char: string): LetterRect | null {
    return this.properties.Letters[char] ?? null;
  }
}
