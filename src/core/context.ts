/**
 * State shared by everything that runs one story
 */

import { AudioChannels, type AudioOutput } from '../audio/channels.js';
import type { StoryContainer } from '../container/reader.js';
import { colors, printPlayer } from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import type { RemoteClient } from '../remote/client.js';
import { ResponseQueue } from '../remote/queue.js';
import type { IntroStyle } from '../script/types.js';
import { VariableTable } from '../script/variables.js';
import type { AnimationKind, Sprite } from '../sprites/sprite.js';
import { SpriteStage } from '../sprites/stage.js';
import { AnimationClock } from '../timing/clock.js';
import { ScreenFade } from '../timing/fade.js';
import { RestGate } from '../timing/rest.js';
import type { Verbosity } from '../types/player.js';
import { AfterTimers, type DueScript } from './timers.js';

/**
 * Callbacks into the host application
 */
export interface StoryHost {
  onDialog(text: string): void;
}

export interface HaltState {
  active: boolean;
  /** Seconds left for halt_auto, null while waiting for resume() */
  remaining: number | null;
}

export type WaitTarget =
  | { kind: 'sprite'; sprite: Sprite; animation: AnimationKind }
  | { kind: 'screen' };

export interface DialogSettings {
  /** Seconds between letters */
  textDelay: number;
  fadeRow: number;
  introStyle: IntroStyle;
  /** Sound played on the text channel with each dialog line */
  textSound: string | null;
}

export interface SceneRef {
  chapter: string;
  scene: string;
}

export interface StoryContext {
  container: StoryContainer;
  clock: AnimationClock;
  variables: VariableTable;
  stage: SpriteStage;
  rest: RestGate;
  fade: ScreenFade;
  audio: AudioChannels;
  timers: AfterTimers;
  responses: ResponseQueue;
  remote: RemoteClient | null;
  logger: Logger;
  host: StoryHost;
  verbosity: Verbosity;
  halt: HaltState;
  waitFor: WaitTarget | null;
  dialog: DialogSettings;
  /** Scene a script asked for; loaded by the player */
  pendingScene: SceneRef | null;
  /** A scene_with_fade is running */
  sceneTransition: boolean;
  /** Reusable scripts to start as background readers */
  scriptRequests: DueScript[];
}

export interface StoryContextOptions {
  container: StoryContainer;
  audioOutput: AudioOutput;
  logger: Logger;
  host: StoryHost;
  verbosity: Verbosity;
  /** Builds the remote client once the response queue exists */
  remote?: ((responses: ResponseQueue) => RemoteClient) | undefined;
}

/**
 * Create the context for one running story
 */
export function createStoryContext(options: StoryContextOptions): StoryContext {
  const { container } = options;
  const clock = new AnimationClock();
  const responses = new ResponseQueue();

  return {
    container,
    clock,
    variables: new VariableTable(container.initialVariables()),
    stage: new SpriteStage(container.cache, container.windowSize),
    rest: new RestGate(clock),
    fade: new ScreenFade(clock),
    audio: new AudioChannels(options.audioOutput),
    timers: new AfterTimers(),
    responses,
    remote: options.remote ? options.remote(responses) : null,
    logger: options.logger,
    host: options.host,
    verbosity: options.verbosity,
    halt: { active: false, remaining: null },
    waitFor: null,
    dialog: { textDelay: 0.02, fadeRow: 1, introStyle: 'no animation', textSound: null },
    pendingScene: null,
    sceneTransition: false,
    scriptRequests: [],
  };
}

/**
 * Report a script problem: logged always, printed unless quiet
 */
export function warn(context: StoryContext, message: string, extra: Record<string, unknown> = {}): void {
  context.logger.logEvent({ event: 'warning', message, ...extra });
  if (context.verbosity !== 'quiet') {
    printPlayer(`${colors.yellow}Warning${colors.reset} ${message}`);
  }
}
