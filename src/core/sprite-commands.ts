/**
 * Sprite instruction handlers
 */

import type { SpriteContentType } from '../container/types.js';
import type { Instruction, SpriteType } from '../script/types.js';
import { BACKGROUND_ALIAS, type Sprite } from '../sprites/sprite.js';
import { convertRow } from '../timing/speed.js';
import { OPACITY_MAX, OPACITY_MIN } from '../utils/constants.js';
import { clamp } from '../utils/formatting.js';
import { type StoryContext, warn } from './context.js';

export type SpriteInstruction = Extract<
  Instruction,
  {
    type:
      | 'load_sprite'
      | 'sprite_show'
      | 'sprite_hide'
      | 'sprite_hide_all'
      | 'sprite_flip'
      | 'sprite_set_center'
      | 'sprite_move'
      | 'sprite_stop_condition'
      | 'sprite_fade_speed'
      | 'sprite_fade_until'
      | 'sprite_fade_current_value'
      | 'sprite_scale_by'
      | 'sprite_scale_until'
      | 'sprite_rotate_speed'
      | 'sprite_rotate_until'
      | 'sprite_animate'
      | 'sprite_after_stop';
  }
>;

const CONTENT_TYPE: Record<SpriteType, SpriteContentType> = {
  character: 'character',
  object: 'object',
  dialog_sprite: 'dialogSprite',
  background: 'background',
};

export function contentTypeFor(type: SpriteType): SpriteContentType {
  return CONTENT_TYPE[type];
}

/**
 * Find a loaded sprite; backgrounds are found by name
 */
export function findSprite(context: StoryContext, type: SpriteType, alias: string): Sprite | null {
  if (type === 'background') {
    const background = context.stage.get('background', BACKGROUND_ALIAS);
    return background && background.name === alias ? background : null;
  }
  return context.stage.get(CONTENT_TYPE[type], alias) ?? null;
}

async function loadSprite(
  context: StoryContext,
  instruction: Extract<SpriteInstruction, { type: 'load_sprite' }>
): Promise<void> {
  const kind = contentTypeFor(instruction.sprite);
  const { name, alias } = instruction;

  // A second alias for an already-cached asset gets its own instance
  const cached = context.container.cache.get(kind, name);
  const loadAs = cached && kind !== 'background' && cached.generalAlias !== alias ? name : undefined;

  const sprite = await context.container.getSprite(kind, name, alias, loadAs);
  if (!sprite) {
    warn(context, `No ${instruction.sprite} named "${name}" in the story file`);
    return;
  }
  context.stage.register(sprite);
  context.logger.logEvent({ event: 'sprite_loaded', kind, name, alias: sprite.generalAlias });
}

/**
 * Run a sprite instruction
 */
export async function executeSprite(context: StoryContext, instruction: SpriteInstruction): Promise<void> {
  if (instruction.type === 'load_sprite') {
    await loadSprite(context, instruction);
    return;
  }

  if (instruction.type === 'sprite_hide_all') {
    context.stage.hideAll(contentTypeFor(instruction.sprite));
    return;
  }

  const sprite = findSprite(context, instruction.sprite, instruction.alias);
  if (!sprite) {
    warn(context, `${instruction.type}: no ${instruction.sprite} loaded as "${instruction.alias}"`);
    return;
  }

  switch (instruction.type) {
    case 'sprite_show':
      sprite.visible = true;
      break;
    case 'sprite_hide':
      sprite.visible = false;
      break;
    case 'sprite_flip':
      if (instruction.horizontal) sprite.flipHorizontal = !sprite.flipHorizontal;
      if (instruction.vertical) sprite.flipVertical = !sprite.flipVertical;
      break;
    case 'sprite_set_center':
      sprite.center = { x: instruction.x, y: instruction.y };
      break;
    case 'sprite_move': {
      if (instruction.xDirection === 'unknown' || instruction.yDirection === 'unknown') {
        warn(context, `sprite_move: unknown direction for "${instruction.alias}"`);
        return;
      }
      // A row of 0 keeps that axis still
      const speedX = instruction.xRow > 0 ? convertRow('move', instruction.xRow) : 0;
      const speedY = instruction.yRow > 0 ? convertRow('move', instruction.yRow) : 0;
      sprite.moving.speedX = instruction.xDirection === 'left' ? -speedX : speedX;
      sprite.moving.speedY = instruction.yDirection === 'up' ? -speedY : speedY;
      break;
    }
    case 'sprite_stop_condition': {
      const { side, location } = instruction;
      if (side === 'unknown' || location === 'unknown') {
        warn(context, `sprite_stop_condition: unknown side or location for "${instruction.alias}"`);
        return;
      }
      if (!context.stage.addMovementStop(sprite, location, side)) {
        warn(context, `sprite_stop_condition: "${instruction.alias}" has no direction of motion yet`);
      }
      break;
    }
    case 'sprite_fade_speed': {
      if (instruction.direction === 'unknown') {
        warn(context, `sprite_fade_speed: unknown direction for "${instruction.alias}"`);
        return;
      }
      const rate = convertRow('fade', instruction.row);
      sprite.fade.speed = instruction.direction === 'fade out' ? -rate : rate;
      break;
    }
    case 'sprite_fade_until':
      sprite.fade.until = clamp(instruction.value, OPACITY_MIN, OPACITY_MAX);
      break;
    case 'sprite_fade_current_value':
      sprite.opacity = clamp(instruction.value, OPACITY_MIN, OPACITY_MAX);
      break;
    case 'sprite_scale_by': {
      if (instruction.direction === 'unknown') {
        warn(context, `sprite_scale_by: unknown direction for "${instruction.alias}"`);
        return;
      }
      const rate = convertRow('scale', instruction.row);
      sprite.scaling.speed = instruction.direction === 'scale down' ? -rate : rate;
      break;
    }
    case 'sprite_scale_until':
      sprite.scaling.until = Math.max(0, instruction.value);
      break;
    case 'sprite_rotate_speed': {
      if (instruction.direction === 'unknown') {
        warn(context, `sprite_rotate_speed: unknown direction for "${instruction.alias}"`);
        return;
      }
      // Counterclockwise is positive
      const rate = convertRow('rotate', instruction.row);
      sprite.rotating.speed = instruction.direction === 'clockwise' ? -rate : rate;
      break;
    }
    case 'sprite_rotate_until':
      sprite.rotating.until = instruction.value;
      break;
    case 'sprite_animate':
      switch (instruction.animation) {
        case 'fade':
          sprite.fade.active = instruction.active;
          break;
        case 'move':
          sprite.moving.active = instruction.active;
          break;
        case 'scale':
          sprite.scaling.active = instruction.active;
          break;
        case 'rotate':
          sprite.rotating.active = instruction.active;
          break;
      }
      break;
    case 'sprite_after_stop':
      sprite.afterStop[instruction.animation] = instruction.script;
      break;
  }
}
