export type {
  ArithmeticOperator,
  CompiledCondition,
  ComparisonOperator,
  Expression,
  LogicalOperator,
} from './ast';
export { referencedVariables } from './ast';
export { ConditionSyntaxError, compileCondition, parseCondition, tokenize } from './parser';
export type { Token } from './parser';
export { evaluateCondition, evaluateExpression } from './evaluator';
