/**
 * Condition evaluation and the conditional-block skip state
 */

import { parseDecimal } from './fields.js';
import type { CaseInstruction, ConditionOperator } from './types.js';

/**
 * Raised for a between/not-between operand that is not "<low> and <high>"
 */
export class ConditionFormatError extends Error {
  readonly operand: string;

  constructor(operand: string, reason: string) {
    super(`Invalid range "${operand}": ${reason}`);
    this.name = 'ConditionFormatError';
    this.operand = operand;
  }
}

export interface Condition {
  value1: string;
  value2: string;
  operator: ConditionOperator;
}

/**
 * Parse "<low> and <high>" into numeric bounds
 * @throws ConditionFormatError when the shape or either bound is wrong
 */
export function parseRangeOperand(operand: string): [number, number] {
  const parts = operand.trim().split(/\s+/);
  if (parts.length !== 3 || parts[1]?.toLowerCase() !== 'and') {
    throw new ConditionFormatError(operand, 'expected "<low> and <high>"');
  }

  const low = parseDecimal(parts[0] ?? '');
  const high = parseDecimal(parts[2] ?? '');
  if (low === null || high === null) {
    throw new ConditionFormatError(operand, 'bounds must be numbers');
  }
  return [low, high];
}

function inRange(condition: Condition): boolean {
  const [low, high] = parseRangeOperand(condition.value2);
  const value = parseDecimal(condition.value1);
  if (value === null) {
    throw new ConditionFormatError(condition.value1, 'the compared value must be a number');
  }
  return value >= low && value <= high;
}

function compareNumbers(
  condition: Condition,
  compare: (left: number, right: number) => boolean
): boolean {
  const left = parseDecimal(condition.value1);
  const right = parseDecimal(condition.value2);
  if (left === null || right === null) return false;
  return compare(left, right);
}

/**
 * Evaluate a condition
 *
 * "is" and "is not" compare text literally. Ordering operators compare
 * numbers and are false when either side is not numeric.
 * @throws ConditionFormatError for a malformed between/not-between range
 */
export function evaluate(condition: Condition): boolean {
  switch (condition.operator) {
    case 'is':
      return condition.value1 === condition.value2;
    case 'is not':
      return condition.value1 !== condition.value2;
    case 'more than':
      return compareNumbers(condition, (a, b) => a > b);
    case 'same or more than':
      return compareNumbers(condition, (a, b) => a >= b);
    case 'less than':
      return compareNumbers(condition, (a, b) => a < b);
    case 'same or less than':
      return compareNumbers(condition, (a, b) => a <= b);
    case 'between':
      return inRange(condition);
    case 'not between':
      return !inRange(condition);
    case 'unknown':
      return false;
  }
}

const STRUCTURAL_MARKERS = ['<case_end>', '<or_case', '<case_else>'];

/**
 * Whether a line should be evaluated given the active skip name
 * While skipping, only the structural markers get through.
 */
export function shouldEvaluateLine(line: string, skipName: string | null): boolean {
  if (skipName === null) return true;
  const trimmed = line.trim();
  return STRUCTURAL_MARKERS.some((marker) => trimmed.startsWith(marker));
}

/**
 * Skip state of the current case block
 * Blocks do not nest.
 */
export class ConditionBlock {
  /** Name of the condition being skipped under, null when not skipping */
  skipName: string | null = null;
  /** Whether a branch of the current block already ran */
  branchTaken = false;

  get skipping(): boolean {
    return this.skipName !== null;
  }

  /**
   * Handle case / or_case
   * @returns the condition outcome, or null when the condition was not evaluated
   */
  enterCase(instruction: CaseInstruction): boolean | null {
    const name = instruction.name ?? instruction.type;

    if (instruction.type === 'case') {
      this.branchTaken = false;
    } else if (this.branchTaken) {
      this.skipName = name;
      return null;
    }

    const result = evaluate(instruction);
    if (result) {
      this.skipName = null;
      this.branchTaken = true;
    } else {
      this.skipName = name;
    }
    return result;
  }

  enterElse(): void {
    if (this.branchTaken) {
      this.skipName = 'case_else';
      return;
    }
    this.skipName = null;
    this.branchTaken = true;
  }

  end(): void {
    this.skipName = null;
    this.branchTaken = false;
  }
}
