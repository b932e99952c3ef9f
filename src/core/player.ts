/**
 * Frame-driven story player
 */

import { loadReusableScript, loadSceneScript } from '../script/loader.js';
import type { FadeOverlay } from '../timing/fade.js';
import {
  type SceneRef,
  type StoryContext,
  type StoryContextOptions,
  createStoryContext,
  warn,
} from './context.js';
import { BackgroundReaders, StoryReader } from './reader.js';
import type { DueScript } from './timers.js';

/**
 * What the host needs after a frame
 */
export interface FrameResult {
  /** Main reader did not read this frame */
  paused: boolean;
  /** Nothing is left to run */
  finished: boolean;
  /** Screen fade overlay to draw, if any */
  overlay: FadeOverlay | null;
}

export class Player {
  readonly context: StoryContext;
  readonly background = new BackgroundReaders();
  private main: StoryReader | null = null;
  private stopped = false;

  constructor(options: StoryContextOptions) {
    this.context = createStoryContext(options);
  }

  get mainReader(): StoryReader | null {
    return this.main;
  }

  /**
   * Load the first scene: the given one, or the container's start scene
   * @returns false when the scene cannot be found
   */
  start(scene?: SceneRef): boolean {
    const target = scene ?? this.context.container.getStartScene();
    if (!target) {
      warn(this.context, 'The story file has no start scene');
      this.stopped = true;
      return false;
    }
    this.context.logger.logEvent({ event: 'story_start', ...target });
    return this.loadScene(target);
  }

  /**
   * Replace the main reader with a new scene
   * Sprite caches, background readers and timers are cleared.
   */
  loadScene(target: SceneRef): boolean {
    const { context } = this;
    context.pendingScene = null;
    context.sceneTransition = false;
    context.waitFor = null;
    context.scriptRequests = [];
    context.stage.clear();
    context.timers.cancelAll();
    this.background.clear();

    const source = loadSceneScript(context.container, target.chapter, target.scene);
    if (!source) {
      warn(context, `Scene not found: ${target.chapter}/${target.scene}`);
      this.main = null;
      this.stopped = true;
      return false;
    }

    this.main = new StoryReader(source, 'main');
    this.stopped = false;
    context.logger.logEvent({ event: 'scene_load', ...target, lines: source.lines.length });
    return true;
  }

  /**
   * Release a halt (the host's "continue" input)
   */
  resume(): void {
    this.context.halt = { active: false, remaining: null };
  }

  get halted(): boolean {
    return this.context.halt.active;
  }

  /**
   * Whether the main reader must wait this frame
   */
  isMainPaused(): boolean {
    const { context } = this;
    if (context.rest.pauseRequired()) return true;
    if (context.halt.active) return true;
    if (context.sceneTransition) return true;
    if (context.responses.pending > 0) return true;

    const wait = context.waitFor;
    if (wait) {
      const busy =
        wait.kind === 'screen' ? context.fade.busy : wait.sprite.isAnimating(wait.animation);
      if (busy) return true;
      context.waitFor = null;
    }
    return false;
  }

  get finished(): boolean {
    const { context } = this;
    if (this.stopped) return true;
    return (
      (this.main?.finished ?? true) &&
      this.background.size === 0 &&
      context.scriptRequests.length === 0 &&
      context.timers.size === 0 &&
      context.pendingScene === null &&
      !context.sceneTransition &&
      !context.fade.active &&
      context.responses.pending === 0 &&
      context.responses.size === 0 &&
      !context.rest.pauseRequired() &&
      !context.halt.active
    );
  }

  private startScripts(requests: DueScript[]): void {
    for (const { name, args } of requests) {
      if (this.background.has(name)) continue;
      const source = loadReusableScript(this.context.container, name, args);
      if (!source) {
        warn(this.context, `Reusable script not found: ${name}`);
        continue;
      }
      this.background.start(source);
    }
  }

  private takeScriptRequests(): DueScript[] {
    const requests = this.context.scriptRequests;
    this.context.scriptRequests = [];
    return requests;
  }

  private tickHalt(delta: number): void {
    const { halt } = this.context;
    if (!halt.active || halt.remaining === null) return;
    halt.remaining -= delta;
    if (halt.remaining <= 0) {
      this.resume();
    }
  }

  /**
   * Run one frame
   * @throws ConditionFormatError from a malformed range condition in a script
   */
  async frame(deltaSeconds: number): Promise<FrameResult> {
    const { context } = this;

    context.clock.tick(deltaSeconds);
    const { delta } = context.clock;

    context.rest.tick();
    this.tickHalt(delta);
    context.fade.update();

    this.startScripts(context.timers.advance(delta));
    const afterStops = context.stage
      .update(delta)
      .flatMap(({ script }) => (script ? [{ name: script, args: null }] : []));
    this.startScripts(afterStops);

    context.responses.drain();

    if (context.pendingScene) {
      this.loadScene(context.pendingScene);
    }

    const paused = this.isMainPaused();
    if (!paused && this.main) {
      await this.main.run(context, () => this.isMainPaused());
    }

    this.startScripts(this.takeScriptRequests());
    await this.background.runAll(context);
    // Scripts called from background readers start on the next frame
    this.startScripts(this.takeScriptRequests());

    if (context.pendingScene && !context.sceneTransition) {
      this.loadScene(context.pendingScene);
    }

    return {
      paused,
      finished: this.finished,
      overlay: context.fade.draw(),
    };
  }
}
