/**
 * Script line parser
 *
 * Recognizes the command syntax:
 * - <name>
 * - <name: arg1, arg2, ...>
 * Anything else is dialog text; blank lines and # comments are ignored.
 */

import { bindCommand } from './catalogue.js';
import type { BindResult, CommandLine } from './types.js';

/** Get character at position, or empty string if out of bounds */
function charAt(input: string, pos: number): string {
  return input[pos] ?? '';
}

function isLowerLetter(char: string): boolean {
  return char >= 'a' && char <= 'z';
}

function isWordChar(char: string): boolean {
  return /\w/.test(char);
}

/**
 * Scan a command name at position: [a-z]+, then underscores, then word characters
 * Returns the position after the name, or -1 when no name starts there
 */
export function scanCommandName(input: string, startPos: number): number {
  let i = startPos;
  while (isLowerLetter(charAt(input, i))) i++;
  if (i === startPos) return -1;

  while (charAt(input, i) === '_') i++;

  const wordStart = i;
  while (i < input.length && isWordChar(charAt(input, i))) i++;

  // A single-letter name has nothing left for the trailing word characters
  if (i === wordStart && i - startPos < 2) return -1;
  return i;
}

/**
 * Split an argument list on commas, trimming each argument
 * An empty list yields no arguments.
 */
export function splitArguments(text: string): string[] {
  if (text.trim() === '') return [];
  return text.split(',').map((arg) => arg.trim());
}

/**
 * Parse a command line, or null when the line is not a command
 */
export function parseCommandLine(input: string): CommandLine | null {
  const trimmed = input.trim();

  if (charAt(trimmed, 0) !== '<' || !trimmed.endsWith('>')) {
    return null;
  }

  const nameEnd = scanCommandName(trimmed, 1);
  if (nameEnd === -1) return null;
  const name = trimmed.slice(1, nameEnd);

  let pos = nameEnd;
  while (pos < trimmed.length && charAt(trimmed, pos) === ' ') pos++;

  if (pos === trimmed.length - 1) {
    return { name, args: [] };
  }

  if (charAt(trimmed, pos) !== ':') return null;

  const body = trimmed.slice(pos + 1, -1);
  return { name, args: splitArguments(body) };
}

/**
 * Check if a line is a comment or empty
 */
export function isCommentOrEmpty(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#');
}

/**
 * Split script content into lines
 */
export function splitScript(content: string): string[] {
  return content.split(/\r?\n/);
}

/**
 * Bind a single script line
 *
 * Comments and blank lines bind to null; <line> is an empty dialog line;
 * any non-command line is dialog text.
 */
export function bindLine(line: string): BindResult {
  if (isCommentOrEmpty(line)) {
    return { ok: true, instruction: null };
  }

  const command = parseCommandLine(line);
  if (!command) {
    return { ok: true, instruction: { type: 'dialog', text: line.trim() } };
  }

  if (command.name === 'line' && command.args.length === 0) {
    return { ok: true, instruction: { type: 'dialog', text: '' } };
  }

  return bindCommand(command);
}
