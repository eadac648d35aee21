import type { GraphDefinition } from '@graphrun/schemas';
import { ValidationError, createLogger } from '@graphrun/shared';
import { compileCondition } from '../conditions/parser';
import type { CompiledConditionalEdge, CompiledGraph } from '../types';

const logger = createLogger({ name: 'graph-compiler' });

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Build the runtime form of a definition. Edges are not checked against the
 * node set; a missing node is only discovered when a run reaches it.
 */
export function compileGraph(
  id: string,
  definition: GraphDefinition,
  createdAt: Date = new Date()
): CompiledGraph {
  const frozen = deepFreeze(structuredClone(definition));

  if (frozen.start_node !== undefined && !(frozen.start_node in frozen.nodes)) {
    throw new ValidationError(`start_node "${frozen.start_node}" is not a node of the graph`, {
      startNode: frozen.start_node,
    });
  }

  const conditionalEdges = new Map<string, CompiledConditionalEdge>();
  for (const [source, edge] of Object.entries(frozen.conditional_edges)) {
    const condition = compileCondition(edge.condition);
    if (!condition.ok) {
      logger.warn(
        { graphId: id, source, condition: edge.condition, error: condition.error },
        'Conditional edge will always take its false branch'
      );
    }
    conditionalEdges.set(source, {
      condition,
      trueTarget: edge.true_target,
      falseTarget: edge.false_target,
    });
  }

  return {
    id,
    name: frozen.name,
    description: frozen.description,
    startNode: frozen.start_node,
    nodes: new Map(Object.entries(frozen.nodes)),
    edges: new Map(Object.entries(frozen.edges)),
    conditionalEdges,
    definition: frozen,
    createdAt: createdAt.toISOString(),
  };
}
