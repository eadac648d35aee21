import { describe, it, expect } from 'vitest';
import { ConditionEvaluationError } from '@graphrun/shared';
import { evaluateCondition, evaluateExpression } from './evaluator';
import { compileCondition, parseCondition } from './parser';

describe('evaluateCondition', () => {
  it('should compare state values', () => {
    expect(evaluateCondition('quality_score >= threshold', { quality_score: 8, threshold: 7 })).toBe(true);
    expect(evaluateCondition('quality_score >= threshold', { quality_score: 5, threshold: 7 })).toBe(false);
  });

  it('should bind whole identifiers only', () => {
    expect(evaluateCondition('score_max > score', { score: 1, score_max: 9 })).toBe(true);
  });

  it('should evaluate arithmetic', () => {
    expect(evaluateCondition('a * 2 + 1 == 7', { a: 3 })).toBe(true);
    expect(evaluateCondition('-a < 0', { a: 3 })).toBe(true);
    expect(evaluateCondition('(a + 1) / 2 != 2', { a: 3 })).toBe(false);
  });

  it('should evaluate comparison chains', () => {
    expect(evaluateCondition('1 < a < 3', { a: 2 })).toBe(true);
    expect(evaluateCondition('1 < a < 3', { a: 5 })).toBe(false);
  });

  it('should accept numeric text and booleans', () => {
    expect(evaluateCondition('a > 4', { a: '5' })).toBe(true);
    expect(evaluateCondition('flag == 1', { flag: true })).toBe(true);
    expect(evaluateCondition('not flag', { flag: true })).toBe(false);
  });

  it('should short-circuit logical operators', () => {
    expect(evaluateCondition('a > 0 or missing > 1', { a: 1 })).toBe(true);
    expect(evaluateCondition('a > 5 and missing > 1', { a: 1 })).toBe(false);
  });

  it('should treat evaluation failures as false', () => {
    expect(evaluateCondition('missing > 1', {})).toBe(false);
    expect(evaluateCondition('a > 4', { a: 'five' })).toBe(false);
    expect(evaluateCondition('a > 1', { a: null })).toBe(false);
    expect(evaluateCondition('1 / 0 > 0', {})).toBe(false);
    expect(evaluateCondition('a >', { a: 1 })).toBe(false);
  });

  it('should accept a compiled condition', () => {
    expect(evaluateCondition(compileCondition('x == 2'), { x: 2 })).toBe(true);
  });
});

describe('evaluateExpression', () => {
  it('should raise on unknown identifiers', () => {
    expect(() => evaluateExpression(parseCondition('x > 1'), {})).toThrow("Unknown identifier 'x'");
    expect(() => evaluateExpression(parseCondition('x > 1'), {})).toThrow(ConditionEvaluationError);
  });

  it('should raise on division by zero', () => {
    expect(() => evaluateExpression(parseCondition('a / 0'), { a: 1 })).toThrow('Division by zero');
  });

  it('should return numbers for arithmetic', () => {
    expect(evaluateExpression(parseCondition('a + 0.5'), { a: 1 })).toBe(1.5);
  });
});
