/**
 * Script loading from a story container
 */

import type { StoryContainer } from '../container/reader.js';
import { splitScript } from './parser.js';
import { ARGUMENT_SIGIL, parseScriptArguments, resolveVariables } from './variables.js';

/** The container calls script loading needs */
export type ScriptProvider = Pick<StoryContainer, 'getSceneScript' | 'getReusableScript'>;

/**
 * Lines of a script plus where they came from
 */
export interface ScriptSource {
  /** "chapter/scene" for scenes, the script name for reusables */
  name: string;
  lines: string[];
}

/**
 * Load the chapter script followed by a scene script
 * Returns null when either name is unknown
 */
export function loadSceneScript(
  provider: ScriptProvider,
  chapter: string,
  scene: string
): ScriptSource | null {
  const content = provider.getSceneScript(chapter, scene);
  if (content === null) return null;
  return { name: `${chapter}/${scene}`, lines: splitScript(content) };
}

/**
 * Load a reusable script with its (!key) arguments filled in
 * Returns null when the script is unknown
 */
export function loadReusableScript(
  provider: ScriptProvider,
  name: string,
  args: string | null = null
): ScriptSource | null {
  const content = provider.getReusableScript(name);
  if (content === null) return null;

  const values = parseScriptArguments(args);
  const lines = splitScript(content).map((line) =>
    values.size > 0 ? resolveVariables(line, values, ARGUMENT_SIGIL) : line
  );
  return { name, lines };
}
