/**
 * Typed readers for positional command arguments
 *
 * Validation happens here, while an instruction is built: durations clamp,
 * keywords lower-case, and unrecognized enumerated values become "unknown".
 */

import {
  MAX_DURATION_SECONDS,
  MIN_DURATION_SECONDS,
} from '../utils/constants.js';
import { clamp } from '../utils/formatting.js';
import type { Unknown } from './types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Raised while building an instruction from a non-numeric argument
 */
export class InvalidNumberError extends Error {
  readonly position: number;

  constructor(position: number, value: string, expected: 'integer' | 'number') {
    super(`Argument ${position + 1} must be ${expected === 'integer' ? 'an integer' : 'a number'}, got "${value}"`);
    this.name = 'InvalidNumberError';
    this.position = position;
  }
}

/**
 * Parse a decimal number, or null for anything else (including blanks)
 */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Parse a base-10 integer, or null
 */
export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

/**
 * Clamp a duration into the accepted range of seconds
 */
export function clampDuration(seconds: number): number {
  return clamp(seconds, MIN_DURATION_SECONDS, MAX_DURATION_SECONDS);
}

/**
 * Lower-case a keyword and match it against its allowed values
 */
export function toKeyword<T extends string>(
  value: string,
  allowed: readonly T[]
): T | Unknown {
  const lowered = value.trim().toLowerCase();
  return allowed.find((candidate) => candidate === lowered) ?? 'unknown';
}

export class ArgReader {
  readonly args: readonly string[];

  constructor(args: readonly string[]) {
    this.args = args;
  }

  get count(): number {
    return this.args.length;
  }

  str(position: number): string {
    return this.args[position] ?? '';
  }

  int(position: number): number {
    const value = parseInteger(this.str(position));
    if (value === null) {
      throw new InvalidNumberError(position, this.str(position), 'integer');
    }
    return value;
  }

  float(position: number): number {
    const value = parseDecimal(this.str(position));
    if (value === null) {
      throw new InvalidNumberError(position, this.str(position), 'number');
    }
    return value;
  }

  /** Seconds, clamped */
  duration(position: number): number {
    return clampDuration(this.float(position));
  }

  keyword<T extends string>(position: number, allowed: readonly T[]): T | Unknown {
    return toKeyword(this.str(position), allowed);
  }

  /**
   * Arguments from a position onward, re-joined as written
   */
  rest(position: number): string {
    return this.args.slice(position).join(', ');
  }
}
