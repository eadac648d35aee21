import type { CompiledCondition, ComparisonOperator, Expression } from './ast';

export class ConditionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(message);
    this.name = 'ConditionSyntaxError';
  }
}

export type Token =
  | { type: 'number'; value: number; position: number }
  | { type: 'identifier'; value: string; position: number }
  | { type: 'keyword'; value: 'and' | 'or' | 'not'; position: number }
  | { type: 'operator'; value: string; position: number }
  | { type: 'end'; position: number };

const NUMBER_PATTERN = /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENTIFIER_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;
const OPERATORS = ['==', '!=', '<=', '>=', '<', '>', '+', '-', '*', '/', '(', ')'];
const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['==', '!=', '<=', '>=', '<', '>'];
const ADDITIVE_OPERATORS = ['+', '-'] as const;
const MULTIPLICATIVE_OPERATORS = ['*', '/'] as const;

function matchAt(pattern: RegExp, source: string, position: number): string | undefined {
  pattern.lastIndex = position;
  const match = pattern.exec(source);
  return match ? match[0] : undefined;
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  while (position < source.length) {
    const char = source[position];

    if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
      position++;
      continue;
    }

    const number = matchAt(NUMBER_PATTERN, source, position);
    if (number !== undefined) {
      tokens.push({ type: 'number', value: Number(number), position });
      position += number.length;
      continue;
    }

    const word = matchAt(IDENTIFIER_PATTERN, source, position);
    if (word !== undefined) {
      if (word === 'and' || word === 'or' || word === 'not') {
        tokens.push({ type: 'keyword', value: word, position });
      } else {
        tokens.push({ type: 'identifier', value: word, position });
      }
      position += word.length;
      continue;
    }

    const operator = OPERATORS.find((op) => source.startsWith(op, position));
    if (operator === undefined) {
      throw new ConditionSyntaxError(`Unexpected character '${char}' at position ${position}`, position);
    }
    tokens.push({ type: 'operator', value: operator, position });
    position += operator.length;
  }

  tokens.push({ type: 'end', position: source.length });
  return tokens;
}

/**
 * Recursive-descent parser over the token stream. Precedence, loosest first:
 * or, and, not, comparison, + -, * /, unary sign.
 */
class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Expression {
    const expression = this.parseOr();
    const next = this.peek();
    if (next.type !== 'end') {
      throw new ConditionSyntaxError(
        `Unexpected ${describe(next)} at position ${next.position}`,
        next.position
      );
    }
    return expression;
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.acceptKeyword('or')) {
      left = { kind: 'logical', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.acceptKeyword('and')) {
      left = { kind: 'logical', operator: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): Expression {
    if (this.acceptKeyword('not')) {
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    const first = this.parseAdditive();
    const operands: Expression[] = [first];
    const operators: ComparisonOperator[] = [];

    let operator = this.acceptOperator(COMPARISON_OPERATORS);
    while (operator !== undefined) {
      operators.push(operator);
      operands.push(this.parseAdditive());
      operator = this.acceptOperator(COMPARISON_OPERATORS);
    }

    return operators.length === 0 ? first : { kind: 'comparison', operands, operators };
  }

  private parseAdditive(): Expression {
    let left = this.parseTerm();
    let operator = this.acceptOperator(ADDITIVE_OPERATORS);
    while (operator !== undefined) {
      left = { kind: 'arithmetic', operator, left, right: this.parseTerm() };
      operator = this.acceptOperator(ADDITIVE_OPERATORS);
    }
    return left;
  }

  private parseTerm(): Expression {
    let left = this.parseUnary();
    let operator = this.acceptOperator(MULTIPLICATIVE_OPERATORS);
    while (operator !== undefined) {
      left = { kind: 'arithmetic', operator, left, right: this.parseUnary() };
      operator = this.acceptOperator(MULTIPLICATIVE_OPERATORS);
    }
    return left;
  }

  private parseUnary(): Expression {
    const sign = this.acceptOperator(ADDITIVE_OPERATORS);
    if (sign === '-') {
      return { kind: 'negate', operand: this.parseUnary() };
    }
    if (sign === '+') {
      return this.parseUnary();
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.next();

    if (token.type === 'number') {
      return { kind: 'number', value: token.value };
    }
    if (token.type === 'identifier') {
      return { kind: 'variable', name: token.value };
    }
    if (token.type === 'operator' && token.value === '(') {
      const inner = this.parseOr();
      const closing = this.next();
      if (closing.type !== 'operator' || closing.value !== ')') {
        throw new ConditionSyntaxError(
          `Expected ')' at position ${closing.position}`,
          closing.position
        );
      }
      return inner;
    }

    throw new ConditionSyntaxError(
      `Unexpected ${describe(token)} at position ${token.position}`,
      token.position
    );
  }

  private peek(): Token {
    return this.tokens[this.index] ?? { type: 'end', position: 0 };
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== 'end') {
      this.index++;
    }
    return token;
  }

  private acceptKeyword(keyword: 'and' | 'or' | 'not'): boolean {
    const token = this.peek();
    if (token.type === 'keyword' && token.value === keyword) {
      this.index++;
      return true;
    }
    return false;
  }

  private acceptOperator<T extends string>(accepted: readonly T[]): T | undefined {
    const token = this.peek();
    if (token.type !== 'operator') {
      return undefined;
    }
    const value = token.value;
    const match = accepted.find((operator) => operator === value);
    if (match !== undefined) {
      this.index++;
    }
    return match;
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case 'end':
      return 'end of expression';
    case 'number':
      return `number ${token.value}`;
    default:
      return `'${token.value}'`;
  }
}

export function parseCondition(source: string): Expression {
  if (source.trim() === '') {
    throw new ConditionSyntaxError('Condition is empty', 0);
  }
  return new Parser(tokenize(source)).parse();
}

/**
 * Parse a condition once, keeping a parse failure as data so that the
 * edge can still be evaluated (always false) at run time.
 */
export function compileCondition(source: string): CompiledCondition {
  try {
    return { ok: true, source, expression: parseCondition(source) };
  } catch (error) {
    if (error instanceof ConditionSyntaxError) {
      return { ok: false, source, error: error.message };
    }
    throw error;
  }
}
