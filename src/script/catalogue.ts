/**
 * Command catalogue: binds a command name plus argument count to an instruction
 */

import type { AnimationKind, StopSide } from '../sprites/sprite.js';
import { STOP_LOCATIONS } from '../sprites/stage.js';
import { VOLUME_SCALE } from '../utils/constants.js';
import { clamp } from '../utils/formatting.js';
import { ArgReader, InvalidNumberError, parseInteger } from './fields.js';
import {
  type BindResult,
  CONDITION_OPERATORS,
  type CommandLine,
  type Instruction,
  SPRITE_TYPES,
  type SpriteStopConditionInstruction,
  type SpriteType,
  type VolumeChannel,
} from './types.js';

type Builder = (args: ArgReader) => Instruction;

export interface CommandEntry {
  /** Builders keyed by exact argument count */
  arities: Partial<Record<number, Builder>>;
  /** Builder for at least `min` arguments, the tail passed through as written */
  variadic?: { min: number; build: Builder } | undefined;
}

const STOP_SIDES: readonly StopSide[] = ['left', 'right', 'top', 'bottom'];
const ANIMATIONS: readonly AnimationKind[] = ['fade', 'move', 'scale', 'rotate'];

const catalogue = new Map<string, CommandEntry>();

function define(
  name: string,
  arities: Partial<Record<number, Builder>>,
  variadic?: { min: number; build: Builder }
): void {
  catalogue.set(name, { arities, variadic });
}

// === Flow ===
define('scene', {
  2: (a) => ({ type: 'scene', chapter: a.str(0), scene: a.str(1) }),
});
define('scene_with_fade', {
  6: (a) => ({
    type: 'scene_with_fade',
    color: a.str(0),
    fadeInRow: a.int(1),
    fadeOutRow: a.int(2),
    holdSeconds: a.duration(3),
    chapter: a.str(4),
    scene: a.str(5),
  }),
});
define(
  'call',
  { 1: (a) => ({ type: 'call', name: a.str(0), args: null }) },
  { min: 2, build: (a) => ({ type: 'call', name: a.str(0), args: a.rest(1) }) }
);
define(
  'after',
  { 2: (a) => ({ type: 'after', seconds: a.duration(0), name: a.str(1), args: null }) },
  {
    min: 3,
    build: (a) => ({ type: 'after', seconds: a.duration(0), name: a.str(1), args: a.rest(2) }),
  }
);
define('after_cancel', { 1: (a) => ({ type: 'after_cancel', name: a.str(0) }) });
define('after_cancel_all', { 0: () => ({ type: 'after_cancel_all' }) });
define('halt', { 0: () => ({ type: 'halt' }) });
define('halt_auto', { 1: (a) => ({ type: 'halt_auto', seconds: a.duration(0) }) });
define('rest', { 1: (a) => ({ type: 'rest', seconds: a.duration(0) }) });
define('wait_for_animation', {
  1: (a) => ({ type: 'wait_for_screen', what: a.keyword(0, ['fade screen']) }),
  3: (a) => ({
    type: 'wait_for_animation',
    sprite: a.keyword(0, SPRITE_TYPES),
    alias: a.str(1),
    animation: a.keyword(2, ANIMATIONS),
  }),
});

// === Variables and conditions ===
define('variable_set', {
  2: (a) => ({ type: 'variable_set', name: a.str(0), value: a.str(1) }),
});
for (const type of ['case', 'or_case'] as const) {
  define(type, {
    3: (a) => ({
      type,
      value1: a.str(0),
      operator: a.keyword(1, CONDITION_OPERATORS),
      value2: a.str(2),
      name: null,
    }),
    4: (a) => ({
      type,
      value1: a.str(0),
      operator: a.keyword(1, CONDITION_OPERATORS),
      value2: a.str(2),
      name: a.str(3),
    }),
  });
}
define('case_else', { 0: () => ({ type: 'case_else' }) });
define('case_end', { 0: () => ({ type: 'case_end' }) });

// === Audio ===
for (const type of ['play_sound', 'play_voice', 'dialog_text_sound'] as const) {
  define(type, { 1: (a) => ({ type, name: a.str(0) }) });
}
define('play_music', {
  1: (a) => ({ type: 'play_music', name: a.str(0), loop: false }),
  2: (a) => ({ type: 'play_music', name: a.str(0), loop: a.keyword(1, ['loop']) === 'loop' }),
});
for (const type of [
  'stop_fx',
  'stop_voice',
  'stop_music',
  'stop_all_audio',
  'dialog_text_sound_clear',
] as const) {
  define(type, { 0: () => ({ type }) });
}
const VOLUME_CHANNELS: readonly VolumeChannel[] = ['fx', 'voice', 'music', 'text'];
for (const channel of VOLUME_CHANNELS) {
  define(`volume_${channel}`, {
    1: (a) => ({
      type: 'volume',
      channel,
      volume: clamp(a.int(0), 0, VOLUME_SCALE) / VOLUME_SCALE,
    }),
  });
}

// === Sprites ===
function stopLocation(a: ArgReader, position: number): SpriteStopConditionInstruction['location'] {
  const pixel = parseInteger(a.str(position));
  return pixel ?? a.keyword(position, STOP_LOCATIONS);
}

function defineSpriteCommands(sprite: Exclude<SpriteType, 'background'>): void {
  define(`load_${sprite}`, {
    2: (a) => ({ type: 'load_sprite', sprite, name: a.str(0), alias: a.str(1) }),
  });
  define(`${sprite}_show`, { 1: (a) => ({ type: 'sprite_show', sprite, alias: a.str(0) }) });
  define(`${sprite}_hide`, { 1: (a) => ({ type: 'sprite_hide', sprite, alias: a.str(0) }) });
  define(`${sprite}_hide_all`, { 0: () => ({ type: 'sprite_hide_all', sprite }) });

  const flips = { both: [true, true], horizontal: [true, false], vertical: [false, true] } as const;
  for (const [suffix, [horizontal, vertical]] of Object.entries(flips)) {
    define(`${sprite}_flip_${suffix}`, {
      1: (a) => ({ type: 'sprite_flip', sprite, alias: a.str(0), horizontal, vertical }),
    });
  }

  define(`${sprite}_set_center`, {
    3: (a) => ({ type: 'sprite_set_center', sprite, alias: a.str(0), x: a.int(1), y: a.int(2) }),
  });
  define(`${sprite}_move`, {
    5: (a) => ({
      type: 'sprite_move',
      sprite,
      alias: a.str(0),
      xRow: a.int(1),
      xDirection: a.keyword(2, ['left', 'right']),
      yRow: a.int(3),
      yDirection: a.keyword(4, ['up', 'down']),
    }),
  });
  define(`${sprite}_stop_movement_condition`, {
    2: (a) => ({
      type: 'sprite_stop_condition',
      sprite,
      alias: a.str(0),
      side: null,
      location: stopLocation(a, 1),
    }),
    3: (a) => ({
      type: 'sprite_stop_condition',
      sprite,
      alias: a.str(0),
      side: a.keyword(1, STOP_SIDES),
      location: stopLocation(a, 2),
    }),
  });

  const toggles: Record<AnimationKind, [start: string, stop: string]> = {
    move: ['start_moving', 'stop_moving'],
    fade: ['start_fading', 'stop_fading'],
    scale: ['start_scaling', 'stop_scaling'],
    rotate: ['start_rotating', 'stop_rotating'],
  };
  const afterStops: Record<AnimationKind, string> = {
    move: 'after_moving_stop',
    fade: 'after_fading_stop',
    scale: 'after_scaling_stop',
    rotate: 'after_rotating_stop',
  };
  for (const animation of ANIMATIONS) {
    const [start, stop] = toggles[animation];
    define(`${sprite}_${start}`, {
      1: (a) => ({ type: 'sprite_animate', sprite, alias: a.str(0), animation, active: true }),
    });
    define(`${sprite}_${stop}`, {
      1: (a) => ({ type: 'sprite_animate', sprite, alias: a.str(0), animation, active: false }),
    });
    define(`${sprite}_${afterStops[animation]}`, {
      2: (a) => ({ type: 'sprite_after_stop', sprite, alias: a.str(0), animation, script: a.str(1) }),
    });
  }

  define(`${sprite}_fade_speed`, {
    3: (a) => ({
      type: 'sprite_fade_speed',
      sprite,
      alias: a.str(0),
      row: a.int(1),
      direction: a.keyword(2, ['fade in', 'fade out']),
    }),
  });
  define(`${sprite}_fade_until`, {
    2: (a) => ({ type: 'sprite_fade_until', sprite, alias: a.str(0), value: a.int(1) }),
  });
  define(`${sprite}_fade_current_value`, {
    2: (a) => ({ type: 'sprite_fade_current_value', sprite, alias: a.str(0), value: a.int(1) }),
  });
  define(`${sprite}_scale_by`, {
    3: (a) => ({
      type: 'sprite_scale_by',
      sprite,
      alias: a.str(0),
      row: a.int(1),
      direction: a.keyword(2, ['scale up', 'scale down']),
    }),
  });
  define(`${sprite}_scale_until`, {
    2: (a) => ({ type: 'sprite_scale_until', sprite, alias: a.str(0), value: a.float(1) }),
  });
  define(`${sprite}_rotate_speed`, {
    3: (a) => ({
      type: 'sprite_rotate_speed',
      sprite,
      alias: a.str(0),
      row: a.int(1),
      direction: a.keyword(2, ['clockwise', 'counterclockwise']),
    }),
  });
  define(`${sprite}_rotate_until`, {
    2: (a) => ({
      type: 'sprite_rotate_until',
      sprite,
      alias: a.str(0),
      value: a.keyword(1, ['forever']) === 'forever' ? 'forever' : a.float(1),
    }),
  });
}

defineSpriteCommands('character');
defineSpriteCommands('object');
defineSpriteCommands('dialog_sprite');

// Backgrounds share one alias, so they are addressed by name
define('load_background', {
  1: (a) => ({ type: 'load_sprite', sprite: 'background', name: a.str(0), alias: a.str(0) }),
});
define('background_show', {
  1: (a) => ({ type: 'sprite_show', sprite: 'background', alias: a.str(0) }),
});
define('background_hide', {
  1: (a) => ({ type: 'sprite_hide', sprite: 'background', alias: a.str(0) }),
});
define('background_hide_all', { 0: () => ({ type: 'sprite_hide_all', sprite: 'background' }) });

// === Dialog text ===
define('font_text_delay', { 1: (a) => ({ type: 'font_text_delay', seconds: a.duration(0) }) });
define('font_text_fade_speed', { 1: (a) => ({ type: 'font_text_fade_speed', row: a.int(0) }) });
define('font_intro_animation', {
  1: (a) => ({
    type: 'font_intro_animation',
    style: a.keyword(0, ['no animation', 'gradual letter', 'gradual letter fade in', 'fade in']),
  }),
});

// === Remote ===
define('remote_save', {}, { min: 1, build: (a) => ({ type: 'remote_save', args: a.rest(0) }) });
define('remote_get', {
  1: (a) => ({ type: 'remote_get', key: a.str(0), variable: null }),
  2: (a) => ({ type: 'remote_get', key: a.str(0), variable: a.str(1) }),
});
define(
  'remote_call',
  { 1: (a) => ({ type: 'remote_call', command: a.str(0), args: null }) },
  { min: 2, build: (a) => ({ type: 'remote_call', command: a.str(0), args: a.rest(1) }) }
);

/**
 * Whether a command name is in the catalogue
 */
export function isKnownCommand(name: string): boolean {
  return catalogue.has(name);
}

/**
 * Every command name, sorted
 */
export function commandNames(): string[] {
  return [...catalogue.keys()].sort();
}

function describeArities(entry: CommandEntry): string {
  const counts = Object.keys(entry.arities).map(Number);
  const parts = counts.map(String);
  if (entry.variadic) parts.push(`${entry.variadic.min}+`);
  return parts.join(' or ');
}

/**
 * Bind a parsed command to its instruction
 * Never throws: failures come back as a BindError.
 */
export function bindCommand(command: CommandLine): BindResult {
  const entry = catalogue.get(command.name);
  if (!entry) {
    return {
      ok: false,
      error: { kind: 'unknown_command', message: `Unknown command: ${command.name}` },
    };
  }

  const count = command.args.length;
  const variadic = entry.variadic && count >= entry.variadic.min ? entry.variadic.build : undefined;
  const build = entry.arities[count] ?? variadic;
  if (!build) {
    return {
      ok: false,
      error: {
        kind: 'argument_count',
        message: `${command.name} takes ${describeArities(entry)} argument(s), got ${count}`,
      },
    };
  }

  try {
    return { ok: true, instruction: build(new ArgReader(command.args)) };
  } catch (error) {
    if (error instanceof InvalidNumberError) {
      return {
        ok: false,
        error: { kind: 'invalid_number', message: `${command.name}: ${error.message}` },
      };
    }
    throw error;
  }
}
