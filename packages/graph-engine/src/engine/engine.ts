import type { GraphDefinition, RunMode } from '@graphrun/schemas';
import { GraphNotFoundError, createLogger } from '@graphrun/shared';
import type { RunState } from '@graphrun/shared';
import { RunRegistry } from '../runs/run-registry';
import type { RunHandle } from '../runs/run-registry';
import { InMemoryGraphStore } from '../store/graph-store';
import type { GraphStore } from '../store/graph-store';
import { ToolRegistry } from '../tools/registry';
import type {
  CompiledGraph,
  ExecuteOptions,
  GraphEngineConfig,
  RunEventListener,
  RunRecord,
} from '../types';
import { GraphExecutor } from './executor';

const logger = createLogger({ name: 'graph-engine' });

export interface GraphEngineOptions extends GraphEngineConfig {
  tools?: ToolRegistry;
  graphs?: GraphStore;
  runs?: RunRegistry;
}

export interface PreparedRun {
  graph: CompiledGraph;
  run: RunHandle;
}

export interface PrepareRunOptions {
  mode?: RunMode;
  pending?: boolean;
}

/**
 * Entry point for graph and run operations. The stores and the tool
 * registry are injected so that callers and tests choose their backing.
 */
export class GraphEngine {
  readonly tools: ToolRegistry;
  readonly graphs: GraphStore;
  readonly runs: RunRegistry;

  private executor: GraphExecutor;
  private controllers: Map<string, AbortController> = new Map();

  constructor(options: GraphEngineOptions = {}) {
    this.tools = options.tools ?? new ToolRegistry();
    this.graphs = options.graphs ?? new InMemoryGraphStore();
    this.runs = options.runs ?? new RunRegistry();
    this.executor = new GraphExecutor(this.tools, {
      maxIterations: options.maxIterations,
      snapshotExcludeKeys: options.snapshotExcludeKeys,
    });
  }

  createGraph(definition: GraphDefinition): string {
    return this.graphs.create(definition).id;
  }

  getGraph(graphId: string): CompiledGraph | undefined {
    return this.graphs.get(graphId);
  }

  requireGraph(graphId: string): CompiledGraph {
    const graph = this.graphs.get(graphId);
    if (!graph) {
      throw new GraphNotFoundError(graphId);
    }
    return graph;
  }

  getRun(runId: string): RunRecord | undefined {
    return this.runs.get(runId);
  }

  /**
   * Register a run for a stored graph without executing it. Throws
   * GraphNotFoundError before anything is registered.
   */
  prepareRun(graphId: string, initialState: RunState, options: PrepareRunOptions = {}): PreparedRun {
    const graph = this.requireGraph(graphId);
    const run = this.runs.start(graphId, initialState, options);
    this.controllers.set(run.runId, new AbortController());
    return { graph, run };
  }

  async executeRun(prepared: PreparedRun, options: ExecuteOptions = {}): Promise<RunRecord> {
    const { graph, run } = prepared;
    const controller = this.controllers.get(run.runId) ?? new AbortController();
    this.controllers.set(run.runId, controller);

    const forwardAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }

    try {
      return await this.executor.execute(graph, run, {
        sink: options.sink,
        signal: controller.signal,
      });
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
      this.controllers.delete(run.runId);
    }
  }

  /** Run a graph to completion on the caller's path. */
  async runGraph(
    graphId: string,
    initialState: RunState,
    options: ExecuteOptions & { mode?: RunMode } = {}
  ): Promise<RunRecord> {
    const prepared = this.prepareRun(graphId, initialState, { mode: options.mode ?? 'sync' });
    return this.executeRun(prepared, options);
  }

  /**
   * Ask an active run to stop. The traversal notices at its next step.
   * Returns false when the run is unknown or already finished.
   */
  cancelRun(runId: string): boolean {
    const controller = this.controllers.get(runId);
    if (!controller) {
      return false;
    }

    logger.info({ runId }, 'Cancelling run');
    controller.abort();
    return true;
  }

  isActive(runId: string): boolean {
    return this.controllers.has(runId);
  }

  /** Listen to the events of every run, or of one run when `runId` is given. */
  subscribe(listener: RunEventListener, runId?: string): () => void {
    const handler: RunEventListener = (event, eventRunId) => {
      if (runId === undefined || runId === eventRunId) {
        listener(event, eventRunId);
      }
    };

    this.executor.on('event', handler);

    return () => {
      this.executor.off('event', handler);
    };
  }
}
