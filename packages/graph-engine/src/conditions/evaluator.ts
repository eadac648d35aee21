import { ConditionEvaluationError, createLogger, errorMessage } from '@graphrun/shared';
import type { RunState } from '@graphrun/shared';
import type {
  ArithmeticOperator,
  CompiledCondition,
  ComparisonOperator,
  Expression,
} from './ast';
import { compileCondition } from './parser';

const logger = createLogger({ name: 'condition-evaluator' });

type Value = number | boolean;

const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Bind a state value to an identifier. Numbers and booleans are taken as is;
 * text is accepted only when it is a complete numeric literal.
 */
function bindValue(name: string, value: unknown): Value {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ConditionEvaluationError(`State key '${name}' is not a finite number`, { name });
    }
    return value;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string' && NUMERIC_TEXT.test(value.trim())) {
    return Number(value.trim());
  }
  throw new ConditionEvaluationError(
    `State key '${name}' holds a ${value === null ? 'null' : typeof value} value, expected a number`,
    { name }
  );
}

function toNumber(value: Value): number {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

function isTruthy(value: Value): boolean {
  return typeof value === 'boolean' ? value : value !== 0;
}

function compare(operator: ComparisonOperator, left: Value, right: Value): boolean {
  const a = toNumber(left);
  const b = toNumber(right);
  switch (operator) {
    case '==':
      return a === b;
    case '!=':
      return a !== b;
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
  }
}

function arithmetic(operator: ArithmeticOperator, left: number, right: number): number {
  switch (operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      if (right === 0) {
        throw new ConditionEvaluationError('Division by zero');
      }
      return left / right;
  }
}

export function evaluateExpression(expression: Expression, state: RunState): Value {
  switch (expression.kind) {
    case 'number':
      return expression.value;

    case 'variable':
      if (!Object.prototype.hasOwnProperty.call(state, expression.name)) {
        throw new ConditionEvaluationError(`Unknown identifier '${expression.name}'`, {
          name: expression.name,
        });
      }
      return bindValue(expression.name, state[expression.name]);

    case 'negate':
      return -toNumber(evaluateExpression(expression.operand, state));

    case 'not':
      return !isTruthy(evaluateExpression(expression.operand, state));

    case 'logical': {
      const left = isTruthy(evaluateExpression(expression.left, state));
      if (expression.operator === 'and' ? !left : left) {
        return left;
      }
      return isTruthy(evaluateExpression(expression.right, state));
    }

    case 'arithmetic': {
      const left = toNumber(evaluateExpression(expression.left, state));
      const right = toNumber(evaluateExpression(expression.right, state));
      const result = arithmetic(expression.operator, left, right);
      if (!Number.isFinite(result)) {
        throw new ConditionEvaluationError('Arithmetic result is not a finite number');
      }
      return result;
    }

    case 'comparison': {
      let left = evaluateExpression(expression.operands[0], state);
      for (let i = 0; i < expression.operators.length; i++) {
        const right = evaluateExpression(expression.operands[i + 1], state);
        if (!compare(expression.operators[i], left, right)) {
          return false;
        }
        left = right;
      }
      return true;
    }
  }
}

/**
 * Evaluate an edge condition against the current state. Never throws: a
 * condition that failed to parse or cannot be evaluated is false.
 */
export function evaluateCondition(condition: CompiledCondition | string, state: RunState): boolean {
  const compiled = typeof condition === 'string' ? compileCondition(condition) : condition;

  if (!compiled.ok) {
    logger.warn({ condition: compiled.source, error: compiled.error }, 'Condition failed to parse');
    return false;
  }

  try {
    return isTruthy(evaluateExpression(compiled.expression, state));
  } catch (error) {
    logger.warn(
      { condition: compiled.source, error: errorMessage(error) },
      'Error evaluating condition'
    );
    return false;
  }
}
