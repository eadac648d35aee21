import type { RunState } from '@graphrun/shared';
import { evaluateCondition } from '../conditions/evaluator';
import { END } from '../types';
import type { CompiledGraph } from '../types';

/**
 * Where a run goes after `current`. Conditional edges are consulted before
 * unconditional ones; a node with neither ends the run.
 */
export function nextNode(
  graph: Pick<CompiledGraph, 'edges' | 'conditionalEdges'>,
  current: string,
  state: RunState
): string {
  const conditional = graph.conditionalEdges.get(current);
  if (conditional) {
    return evaluateCondition(conditional.condition, state)
      ? conditional.trueTarget
      : conditional.falseTarget;
  }

  return graph.edges.get(current) ?? END;
}
