import { describe, expect, it } from 'vitest';

import {
  ConditionBlock,
  ConditionFormatError,
  evaluate,
  parseRangeOperand,
  shouldEvaluateLine,
} from '../../src/script/conditions.js';
import type { CaseInstruction, ConditionOperator } from '../../src/script/types.js';

function condition(value1: string, value2: string, operator: ConditionOperator) {
  return { value1, value2, operator };
}

function caseOf(
  type: 'case' | 'or_case',
  value1: string,
  operator: ConditionOperator,
  value2: string,
  name: string | null = null
): CaseInstruction {
  return { type, value1, operator, value2, name };
}

describe('evaluate', () => {
  it('compares equality literally', () => {
    expect(evaluate(condition('5', '5', 'is'))).toBe(true);
    expect(evaluate(condition('5', '5.0', 'is'))).toBe(false);
    expect(evaluate(condition('5', '5.0', 'is not'))).toBe(true);
  });

  it('orders numbers', () => {
    expect(evaluate(condition('10', '9.5', 'more than'))).toBe(true);
    expect(evaluate(condition('5', '5', 'same or more than'))).toBe(true);
    expect(evaluate(condition('4', '5', 'less than'))).toBe(true);
    expect(evaluate(condition('6', '5', 'same or less than'))).toBe(false);
  });

  it('is false when an ordered operand is not a number', () => {
    expect(evaluate(condition('abc', '5', 'more than'))).toBe(false);
    expect(evaluate(condition('5', '', 'less than'))).toBe(false);
  });

  it('checks inclusive ranges', () => {
    expect(evaluate(condition('7', '5 and 10', 'between'))).toBe(true);
    expect(evaluate(condition('3', '5 and 10', 'between'))).toBe(false);
    expect(evaluate(condition('10', '5  AND  10', 'between'))).toBe(true);
    expect(evaluate(condition('3', '5 and 10', 'not between'))).toBe(true);
  });

  it('raises for a malformed range', () => {
    expect(() => evaluate(condition('7', '5,10', 'between'))).toThrow(ConditionFormatError);
    expect(() => evaluate(condition('7', '5 to 10', 'not between'))).toThrow(
      'Invalid range "5 to 10": expected "<low> and <high>"'
    );
    expect(() => evaluate(condition('seven', '5 and 10', 'between'))).toThrow(ConditionFormatError);
  });

  it('is false for an unknown operator', () => {
    expect(evaluate(condition('1', '1', 'unknown'))).toBe(false);
  });
});

describe('parseRangeOperand', () => {
  it('parses decimal bounds', () => {
    expect(parseRangeOperand(' 1.5 and 2 ')).toEqual([1.5, 2]);
  });

  it('rejects non-numeric bounds', () => {
    expect(() => parseRangeOperand('a and b')).toThrow('Invalid range "a and b": bounds must be numbers');
  });
});

describe('shouldEvaluateLine', () => {
  it('evaluates everything when not skipping', () => {
    expect(shouldEvaluateLine('Hello', null)).toBe(true);
  });

  it('lets only structural markers through while skipping', () => {
    expect(shouldEvaluateLine('Hello', 'check')).toBe(false);
    expect(shouldEvaluateLine('<case: 1, is, 1>', 'check')).toBe(false);
    expect(shouldEvaluateLine('  <case_end>', 'check')).toBe(true);
    expect(shouldEvaluateLine('<or_case: 1, is, 1>', 'check')).toBe(true);
    expect(shouldEvaluateLine('<case_else>', 'check')).toBe(true);
  });
});

describe('ConditionBlock', () => {
  it('skips under the condition name when a case is false', () => {
    const block = new ConditionBlock();

    expect(block.enterCase(caseOf('case', '1', 'is', '2', 'check'))).toBe(false);
    expect(block.skipName).toBe('check');
    expect(block.skipping).toBe(true);
  });

  it('falls back to the instruction type for unnamed conditions', () => {
    const block = new ConditionBlock();
    block.enterCase(caseOf('case', '1', 'is', '2'));
    expect(block.skipName).toBe('case');
  });

  it('takes the first true or_case and skips the rest', () => {
    const block = new ConditionBlock();
    block.enterCase(caseOf('case', '1', 'is', '2'));

    expect(block.enterCase(caseOf('or_case', '1', 'is', '1'))).toBe(true);
    expect(block.skipping).toBe(false);
    expect(block.enterCase(caseOf('or_case', '2', 'is', '2'))).toBeNull();
    expect(block.skipName).toBe('or_case');
  });

  it('runs case_else only when no branch ran', () => {
    const block = new ConditionBlock();
    block.enterCase(caseOf('case', '1', 'is', '2'));
    block.enterElse();
    expect(block.skipping).toBe(false);

    const taken = new ConditionBlock();
    taken.enterCase(caseOf('case', '1', 'is', '1'));
    taken.enterElse();
    expect(taken.skipName).toBe('case_else');
  });

  it('resets on case_end and on a new case', () => {
    const block = new ConditionBlock();
    block.enterCase(caseOf('case', '1', 'is', '1'));
    block.end();
    expect(block.skipping).toBe(false);
    expect(block.branchTaken).toBe(false);

    block.enterCase(caseOf('case', '1', 'is', '1'));
    expect(block.enterCase(caseOf('case', '1', 'is', '1'))).toBe(true);
  });
});
