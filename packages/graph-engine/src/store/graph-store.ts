import { nanoid } from 'nanoid';
import type { GraphDefinition } from '@graphrun/schemas';
import { createLogger } from '@graphrun/shared';
import { compileGraph } from '../graph/compile';
import type { CompiledGraph } from '../types';

const logger = createLogger({ name: 'graph-store' });

export interface GraphStore {
  /** Store a definition under a fresh id. */
  create(definition: GraphDefinition): CompiledGraph;
  get(graphId: string): CompiledGraph | undefined;
  /** Stored graphs in creation order. */
  list(): CompiledGraph[];
}

export class InMemoryGraphStore implements GraphStore {
  private graphs: Map<string, CompiledGraph> = new Map();

  constructor(private generateId: () => string = nanoid) {}

  create(definition: GraphDefinition): CompiledGraph {
    const graphId = this.generateId();
    const graph = compileGraph(graphId, definition);
    this.graphs.set(graphId, graph);

    logger.info({ graphId, name: graph.name, nodes: graph.nodes.size }, 'Graph created');
    return graph;
  }

  get(graphId: string): CompiledGraph | undefined {
    return this.graphs.get(graphId);
  }

  list(): CompiledGraph[] {
    return [...this.graphs.values()];
  }
}
