/**
 * Script readers: the main scene reader and background reusable scripts
 */

import { isCommentOrEmpty, bindLine } from '../script/parser.js';
import { shouldEvaluateLine, ConditionBlock } from '../script/conditions.js';
import type { ScriptSource } from '../script/loader.js';
import { resolveVariables } from '../script/variables.js';
import type { Instruction } from '../script/types.js';
import { previewLine } from '../utils/formatting.js';
import { type StoryContext, warn } from './context.js';
import { execute } from './interpreter.js';

export type ReaderKind = 'main' | 'background';

export class StoryReader {
  readonly source: ScriptSource;
  readonly kind: ReaderKind;
  readonly block = new ConditionBlock();
  private position = 0;

  constructor(source: ScriptSource, kind: ReaderKind) {
    this.source = source;
    this.kind = kind;
  }

  get name(): string {
    return this.source.name;
  }

  get finished(): boolean {
    return this.position >= this.source.lines.length;
  }

  /** 1-based number of the line read last */
  get lineNumber(): number {
    return this.position;
  }

  /**
   * Read and run one line
   * @returns the instruction that ran, or null for a skipped line
   * @throws ConditionFormatError from a malformed range condition
   */
  async step(context: StoryContext): Promise<Instruction | null> {
    const raw = this.source.lines[this.position];
    this.position++;
    if (raw === undefined || isCommentOrEmpty(raw)) return null;

    const line = resolveVariables(raw, context.variables);
    if (!shouldEvaluateLine(line, this.block.skipName)) return null;

    const result = bindLine(line);
    if (!result.ok) {
      warn(context, `${this.name}:${this.position} ${result.error.message}`, {
        kind: result.error.kind,
        line: previewLine(line),
      });
      return null;
    }

    if (result.instruction) {
      await execute(result.instruction, context, this);
    }
    return result.instruction;
  }

  /**
   * Read lines until the script ends, the reader is paused, or a scene change is pending.
   * The main reader also stops after showing a dialog line, so a frame shows at most one.
   * @returns number of lines read
   */
  async run(context: StoryContext, isPaused: () => boolean): Promise<number> {
    let read = 0;
    while (!this.finished && !isPaused() && !context.pendingScene) {
      const instruction = await this.step(context);
      read++;
      if (this.kind === 'main' && instruction?.type === 'dialog') break;
    }
    return read;
  }
}

/**
 * Running reusable scripts, at most one per name
 */
export class BackgroundReaders {
  private readonly readers = new Map<string, StoryReader>();

  get size(): number {
    return this.readers.size;
  }

  has(name: string): boolean {
    return this.readers.has(name);
  }

  /**
   * @returns false when a reader with that name is already running
   */
  start(source: ScriptSource): boolean {
    if (this.readers.has(source.name)) return false;
    this.readers.set(source.name, new StoryReader(source, 'background'));
    return true;
  }

  /**
   * Run every reader to the end of its script, ignoring the main reader's pauses
   */
  async runAll(context: StoryContext): Promise<void> {
    for (const [name, reader] of [...this.readers]) {
      await reader.run(context, () => false);
      if (reader.finished) {
        this.readers.delete(name);
      }
    }
  }

  clear(): void {
    this.readers.clear();
  }
}
