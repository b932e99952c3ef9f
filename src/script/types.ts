/**
 * Types for bound script instructions
 */

import type { AnimationKind, StopSide } from '../sprites/sprite.js';
import type { StopLocation } from '../sprites/stage.js';

/** Sentinel for an enumerated argument the author misspelled */
export type Unknown = 'unknown';

/** Sprite types as written in command names */
export const SPRITE_TYPES = ['character', 'object', 'dialog_sprite', 'background'] as const;

export type SpriteType = (typeof SPRITE_TYPES)[number];

export const CONDITION_OPERATORS = [
  'is',
  'is not',
  'more than',
  'same or more than',
  'less than',
  'same or less than',
  'between',
  'not between',
] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number] | Unknown;

export type FadeDirection = 'fade in' | 'fade out' | Unknown;
export type ScaleDirection = 'scale up' | 'scale down' | Unknown;
export type RotateDirection = 'clockwise' | 'counterclockwise' | Unknown;
export type HorizontalDirection = 'left' | 'right' | Unknown;
export type VerticalDirection = 'up' | 'down' | Unknown;
export type IntroStyle =
  | 'no animation'
  | 'gradual letter'
  | 'gradual letter fade in'
  | 'fade in'
  | Unknown;

/** Audio channels a volume command can target */
export type VolumeChannel = 'fx' | 'voice' | 'music' | 'text';

/** Fields shared by every command that addresses one loaded sprite */
interface SpriteTarget {
  sprite: SpriteType;
  alias: string;
}

// === Flow ===
export interface DialogInstruction {
  type: 'dialog';
  text: string;
}

export interface SceneInstruction {
  type: 'scene';
  chapter: string;
  scene: string;
}

export interface SceneWithFadeInstruction {
  type: 'scene_with_fade';
  /** Hex colour, e.g. "#000000" */
  color: string;
  fadeInRow: number;
  fadeOutRow: number;
  holdSeconds: number;
  chapter: string;
  scene: string;
}

export interface CallInstruction {
  type: 'call';
  name: string;
  /** Raw "key=value, ..." arguments, or null */
  args: string | null;
}

export interface AfterInstruction {
  type: 'after';
  seconds: number;
  name: string;
  args: string | null;
}

export interface AfterCancelInstruction {
  type: 'after_cancel';
  name: string;
}

export interface AfterCancelAllInstruction {
  type: 'after_cancel_all';
}

export interface HaltInstruction {
  type: 'halt';
}

export interface HaltAutoInstruction {
  type: 'halt_auto';
  seconds: number;
}

export interface RestInstruction {
  type: 'rest';
  seconds: number;
}

export interface WaitForAnimationInstruction {
  type: 'wait_for_animation';
  sprite: SpriteType | Unknown;
  alias: string;
  animation: AnimationKind | Unknown;
}

export interface WaitForScreenInstruction {
  type: 'wait_for_screen';
  /** Only "fade screen" is meaningful */
  what: 'fade screen' | Unknown;
}

// === Variables and conditions ===
export interface VariableSetInstruction {
  type: 'variable_set';
  name: string;
  value: string;
}

export interface CaseInstruction {
  type: 'case' | 'or_case';
  value1: string;
  operator: ConditionOperator;
  value2: string;
  /** Identifier carried while skipping, null when unnamed */
  name: string | null;
}

export interface CaseElseInstruction {
  type: 'case_else';
}

export interface CaseEndInstruction {
  type: 'case_end';
}

// === Audio ===
export interface PlayAudioInstruction {
  type: 'play_sound' | 'play_voice' | 'dialog_text_sound';
  name: string;
}

export interface PlayMusicInstruction {
  type: 'play_music';
  name: string;
  loop: boolean;
}

export interface StopAudioInstruction {
  type:
    | 'stop_fx'
    | 'stop_voice'
    | 'stop_music'
    | 'stop_all_audio'
    | 'dialog_text_sound_clear';
}

export interface VolumeInstruction {
  type: 'volume';
  channel: VolumeChannel;
  /** 0..1 */
  volume: number;
}

// === Sprites ===
export interface LoadSpriteInstruction extends SpriteTarget {
  type: 'load_sprite';
  /** Asset name in the container */
  name: string;
}

export interface SpriteVisibilityInstruction extends SpriteTarget {
  type: 'sprite_show' | 'sprite_hide';
}

export interface SpriteHideAllInstruction {
  type: 'sprite_hide_all';
  sprite: SpriteType;
}

export interface SpriteFlipInstruction extends SpriteTarget {
  type: 'sprite_flip';
  horizontal: boolean;
  vertical: boolean;
}

export interface SpriteSetCenterInstruction extends SpriteTarget {
  type: 'sprite_set_center';
  x: number;
  y: number;
}

export interface SpriteMoveInstruction extends SpriteTarget {
  type: 'sprite_move';
  xRow: number;
  xDirection: HorizontalDirection;
  yRow: number;
  yDirection: VerticalDirection;
}

export interface SpriteStopConditionInstruction extends SpriteTarget {
  type: 'sprite_stop_condition';
  /** Explicit edge to check, null to derive it from the location */
  side: StopSide | Unknown | null;
  location: StopLocation | Unknown | number;
}

export interface SpriteFadeSpeedInstruction extends SpriteTarget {
  type: 'sprite_fade_speed';
  row: number;
  direction: FadeDirection;
}

export interface SpriteFadeValueInstruction extends SpriteTarget {
  type: 'sprite_fade_until' | 'sprite_fade_current_value';
  value: number;
}

export interface SpriteScaleByInstruction extends SpriteTarget {
  type: 'sprite_scale_by';
  row: number;
  direction: ScaleDirection;
}

export interface SpriteScaleUntilInstruction extends SpriteTarget {
  type: 'sprite_scale_until';
  value: number;
}

export interface SpriteRotateSpeedInstruction extends SpriteTarget {
  type: 'sprite_rotate_speed';
  row: number;
  direction: RotateDirection;
}

export interface SpriteRotateUntilInstruction extends SpriteTarget {
  type: 'sprite_rotate_until';
  value: number | 'forever';
}

export interface SpriteAnimateInstruction extends SpriteTarget {
  type: 'sprite_animate';
  animation: AnimationKind;
  active: boolean;
}

export interface SpriteAfterStopInstruction extends SpriteTarget {
  type: 'sprite_after_stop';
  animation: AnimationKind;
  script: string;
}

// === Dialog text ===
export interface FontTextDelayInstruction {
  type: 'font_text_delay';
  seconds: number;
}

export interface FontTextFadeSpeedInstruction {
  type: 'font_text_fade_speed';
  row: number;
}

export interface FontIntroAnimationInstruction {
  type: 'font_intro_animation';
  style: IntroStyle;
}

// === Remote ===
export interface RemoteSaveInstruction {
  type: 'remote_save';
  args: string;
}

export interface RemoteGetInstruction {
  type: 'remote_get';
  key: string;
  variable: string | null;
}

export interface RemoteCallInstruction {
  type: 'remote_call';
  command: string;
  args: string | null;
}

/**
 * Union of every bound instruction
 */
export type Instruction =
  | DialogInstruction
  | SceneInstruction
  | SceneWithFadeInstruction
  | CallInstruction
  | AfterInstruction
  | AfterCancelInstruction
  | AfterCancelAllInstruction
  | HaltInstruction
  | HaltAutoInstruction
  | RestInstruction
  | WaitForAnimationInstruction
  | WaitForScreenInstruction
  | VariableSetInstruction
  | CaseInstruction
  | CaseElseInstruction
  | CaseEndInstruction
  | PlayAudioInstruction
  | PlayMusicInstruction
  | StopAudioInstruction
  | VolumeInstruction
  | LoadSpriteInstruction
  | SpriteVisibilityInstruction
  | SpriteHideAllInstruction
  | SpriteFlipInstruction
  | SpriteSetCenterInstruction
  | SpriteMoveInstruction
  | SpriteStopConditionInstruction
  | SpriteFadeSpeedInstruction
  | SpriteFadeValueInstruction
  | SpriteScaleByInstruction
  | SpriteScaleUntilInstruction
  | SpriteRotateSpeedInstruction
  | SpriteRotateUntilInstruction
  | SpriteAnimateInstruction
  | SpriteAfterStopInstruction
  | FontTextDelayInstruction
  | FontTextFadeSpeedInstruction
  | FontIntroAnimationInstruction
  | RemoteSaveInstruction
  | RemoteGetInstruction
  | RemoteCallInstruction;

export type InstructionType = Instruction['type'];

export type BindErrorKind = 'unknown_command' | 'argument_count' | 'invalid_number';

export interface BindError {
  kind: BindErrorKind;
  message: string;
}

/**
 * Result of binding one script line
 * A null instruction means the line is blank or a comment.
 */
export type BindResult =
  | { ok: true; instruction: Instruction | null }
  | { ok: false; error: BindError };

/**
 * A command as written: <name> or <name: args>
 */
export interface CommandLine {
  name: string;
  args: string[];
}
