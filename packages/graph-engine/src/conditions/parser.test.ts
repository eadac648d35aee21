import { describe, it, expect } from 'vitest';
import { referencedVariables } from './ast';
import { ConditionSyntaxError, compileCondition, parseCondition, tokenize } from './parser';

describe('tokenize', () => {
  it('should split identifiers, numbers and operators', () => {
    expect(tokenize('score_max >= 2.5')).toEqual([
      { type: 'identifier', value: 'score_max', position: 0 },
      { type: 'operator', value: '>=', position: 10 },
      { type: 'number', value: 2.5, position: 13 },
      { type: 'end', position: 16 },
    ]);
  });

  it('should recognise keywords', () => {
    expect(tokenize('not a').map((token) => token.type)).toEqual(['keyword', 'identifier', 'end']);
  });

  it('should reject unknown characters', () => {
    expect(() => tokenize('a $ b')).toThrow("Unexpected character '$' at position 2");
  });
});

describe('parseCondition', () => {
  it('should give multiplication precedence over addition', () => {
    expect(parseCondition('a + 2 * 3')).toEqual({
      kind: 'arithmetic',
      operator: '+',
      left: { kind: 'variable', name: 'a' },
      right: {
        kind: 'arithmetic',
        operator: '*',
        left: { kind: 'number', value: 2 },
        right: { kind: 'number', value: 3 },
      },
    });
  });

  it('should keep comparison chains together', () => {
    expect(parseCondition('1 < a <= 3')).toEqual({
      kind: 'comparison',
      operands: [
        { kind: 'number', value: 1 },
        { kind: 'variable', name: 'a' },
        { kind: 'number', value: 3 },
      ],
      operators: ['<', '<='],
    });
  });

  it('should bind not tighter than and', () => {
    expect(parseCondition('not a and b')).toEqual({
      kind: 'logical',
      operator: 'and',
      left: { kind: 'not', operand: { kind: 'variable', name: 'a' } },
      right: { kind: 'variable', name: 'b' },
    });
  });

  it('should parse unary minus and parentheses', () => {
    expect(parseCondition('-(a - 1)')).toEqual({
      kind: 'negate',
      operand: {
        kind: 'arithmetic',
        operator: '-',
        left: { kind: 'variable', name: 'a' },
        right: { kind: 'number', value: 1 },
      },
    });
  });

  it('should report malformed expressions', () => {
    expect(() => parseCondition('')).toThrow('Condition is empty');
    expect(() => parseCondition('a >')).toThrow('Unexpected end of expression at position 3');
    expect(() => parseCondition('(a')).toThrow("Expected ')' at position 2");
    expect(() => parseCondition('a b')).toThrow("Unexpected 'b' at position 2");
    expect(() => parseCondition('a >')).toThrow(ConditionSyntaxError);
  });
});

describe('compileCondition', () => {
  it('should keep a parse failure as data', () => {
    expect(compileCondition('a >')).toEqual({
      ok: false,
      source: 'a >',
      error: 'Unexpected end of expression at position 3',
    });
  });

  it('should list referenced variables once', () => {
    const compiled = compileCondition('a + b > a');
    expect(compiled.ok).toBe(true);
    if (compiled.ok) {
      expect(referencedVariables(compiled.expression)).toEqual(['a', 'b']);
    }
  });
});
