/**
 * Variable table and substitution for script lines
 *
 * Tokens look like ($name): an opening paren, optional spaces, a sigil,
 * the name (spaces inside are dropped), and a closing paren. Reusable
 * scripts use the same scanner with the ! sigil for their arguments.
 */

import { INVALID_VARIABLE_CHARS, MAX_VARIABLE_PASSES } from '../utils/constants.js';

/** Sigil for story variables */
export const VARIABLE_SIGIL = '$';
/** Sigil for reusable-script arguments */
export const ARGUMENT_SIGIL = '!';

/**
 * A token found in a line
 */
export interface VariableToken {
  /** Name with inner spaces removed */
  name: string;
  /** Start offset of the token, including the opening paren */
  start: number;
  /** Offset just past the closing paren */
  end: number;
}

/**
 * A single rewrite: the span it replaces and its replacement text
 */
export interface Substitution {
  value: string;
  start: number;
  end: number;
}

/**
 * Story-wide variables, matched by exact name
 */
export class VariableTable {
  private readonly values = new Map<string, string>();

  constructor(initial?: Iterable<[string, string]>) {
    if (initial) {
      for (const [name, value] of initial) {
        this.values.set(name, value);
      }
    }
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  set(name: string, value: string): void {
    this.values.set(name, value);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get size(): number {
    return this.values.size;
  }

  entries(): IterableIterator<[string, string]> {
    return this.values.entries();
  }
}

/** Anything substitution can look names up in */
export type Lookup = Pick<VariableTable, 'get'> | ReadonlyMap<string, string>;

/** Letters and digits of any script, underscore and space */
const NAME_CHAR = /^[\p{L}\p{N}_ ]$/u;

/**
 * Try to read one token starting at an opening paren
 */
function scanToken(line: string, start: number, sigil: string): VariableToken | null {
  let i = start + 1;
  while (line[i] === ' ') i++;
  if (line[i] !== sigil) return null;
  i++;

  const nameStart = i;
  while (i < line.length) {
    const char = String.fromCodePoint(line.codePointAt(i) ?? 0);
    if (!NAME_CHAR.test(char)) break;
    i += char.length;
  }
  if (i === nameStart || line[i] !== ')') return null;

  const name = line.slice(nameStart, i).replace(/ /g, '');
  if (name === '') return null;
  return { name, start, end: i + 1 };
}

/**
 * Find every token in a line, left to right
 */
export function findTokens(line: string, sigil: string = VARIABLE_SIGIL): VariableToken[] {
  const tokens: VariableToken[] = [];
  let pos = 0;

  while (pos < line.length) {
    if (line[pos] !== '(') {
      pos++;
      continue;
    }
    const token = scanToken(line, pos, sigil);
    if (token) {
      tokens.push(token);
      pos = token.end;
    } else {
      pos++;
    }
  }

  return tokens;
}

/**
 * Apply substitutions left to right, shifting later spans by the running
 * length delta of earlier ones
 */
export function applySubstitutions(line: string, substitutions: Substitution[]): string {
  let result = line;
  let delta = 0;

  for (const { value, start, end } of substitutions) {
    const from = start + delta;
    const to = end + delta;
    result = result.slice(0, from) + value + result.slice(to);
    delta += value.length - (end - start);
  }

  return result;
}

/**
 * One scan-and-rewrite pass
 * @returns the rewritten line and whether anything was substituted
 */
function resolvePass(line: string, lookup: Lookup, sigil: string): [string, boolean] {
  const substitutions: Substitution[] = [];
  for (const token of findTokens(line, sigil)) {
    const value = lookup.get(token.name);
    if (value !== undefined) {
      substitutions.push({ value, start: token.start, end: token.end });
    }
  }
  if (substitutions.length === 0) return [line, false];
  return [applySubstitutions(line, substitutions), true];
}

/**
 * Replace every known token; unknown names stay as written
 * Repeats on its own output for nested references, at most MAX_VARIABLE_PASSES times.
 */
export function resolveVariables(
  line: string,
  lookup: Lookup,
  sigil: string = VARIABLE_SIGIL
): string {
  let result = line;
  for (let pass = 0; pass < MAX_VARIABLE_PASSES; pass++) {
    const [next, changed] = resolvePass(result, lookup, sigil);
    result = next;
    if (!changed) break;
  }
  return result;
}

/**
 * Parse reusable-script arguments: "key=value, key2=value2"
 * Pairs without "=" are skipped; keys are trimmed of spaces.
 */
export function parseScriptArguments(args: string | null): Map<string, string> {
  const parsed = new Map<string, string>();
  if (!args) return parsed;

  for (const pair of args.split(',')) {
    const separator = pair.indexOf('=');
    if (separator === -1) continue;
    const key = pair.slice(0, separator).replace(/ /g, '');
    if (key === '') continue;
    parsed.set(key, pair.slice(separator + 1).trim());
  }
  return parsed;
}

/**
 * Check a variable name before it is stored
 * @returns an error message, or null when the name is acceptable
 */
export function validateVariableName(name: string): string | null {
  if (name.trim() === '') {
    return 'Variable name is blank';
  }
  for (const char of name) {
    if (INVALID_VARIABLE_CHARS.includes(char)) {
      return `Variable name "${name}" contains "${char}"`;
    }
  }
  return null;
}
