export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type ArithmeticOperator = '+' | '-' | '*' | '/';

export type LogicalOperator = 'and' | 'or';

export type Expression =
  | { kind: 'number'; value: number }
  | { kind: 'variable'; name: string }
  | { kind: 'negate'; operand: Expression }
  | { kind: 'not'; operand: Expression }
  | { kind: 'arithmetic'; operator: ArithmeticOperator; left: Expression; right: Expression }
  | { kind: 'logical'; operator: LogicalOperator; left: Expression; right: Expression }
  // `a < b <= c` holds when every adjacent pair holds
  | { kind: 'comparison'; operands: Expression[]; operators: ComparisonOperator[] };

export type CompiledCondition =
  | { ok: true; source: string; expression: Expression }
  | { ok: false; source: string; error: string };

/** Names of the state keys an expression reads. */
export function referencedVariables(expression: Expression): string[] {
  const names = new Set<string>();

  const visit = (node: Expression): void => {
    switch (node.kind) {
      case 'number':
        return;
      case 'variable':
        names.add(node.name);
        return;
      case 'negate':
      case 'not':
        visit(node.operand);
        return;
      case 'arithmetic':
      case 'logical':
        visit(node.left);
        visit(node.right);
        return;
      case 'comparison':
        node.operands.forEach(visit);
        return;
    }
  };

  visit(expression);
  return [...names];
}
