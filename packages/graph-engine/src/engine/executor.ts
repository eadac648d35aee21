import EventEmitter from 'eventemitter3';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { isTerminalStatus } from '@graphrun/schemas';
import type { RunEvent } from '@graphrun/schemas';
import {
  EventDeliveryError,
  NodeNotFoundError,
  ToolExecutionError,
  createLogger,
  errorMessage,
  isPlainObject,
} from '@graphrun/shared';
import type { RunState } from '@graphrun/shared';
import { nextNode } from '../graph/routing';
import { resolveStartNode } from '../graph/start-node';
import type { RunHandle } from '../runs/run-registry';
import type { ToolRegistry } from '../tools/registry';
import {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_SNAPSHOT_EXCLUDE_KEYS,
  END,
  SYSTEM_NODE,
} from '../types';
import type {
  CompiledGraph,
  ExecuteOptions,
  GraphEngineConfig,
  RunEventSink,
  RunRecord,
} from '../types';

const logger = createLogger({ name: 'graph-executor' });

export const MAX_ITERATIONS_REASON = 'max iterations reached';
export const CANCELLED_REASON = 'cancelled';

interface StepResult {
  state: RunState;
  function: string;
  durationMs: number;
}

function now(): string {
  return new Date().toISOString();
}

/**
 * Sends a run's events to the executor's listeners and to the run's sink.
 * Once the sink has failed it receives nothing more.
 */
class EventDelivery {
  private sinkFailed = false;

  constructor(
    private emitter: GraphExecutor,
    private runId: string,
    private sink?: RunEventSink
  ) {}

  async send(event: RunEvent): Promise<void> {
    this.emitter.emit('event', event, this.runId);

    if (!this.sink || this.sinkFailed) {
      return;
    }

    try {
      await this.sink(event);
    } catch (error) {
      this.sinkFailed = true;
      throw new EventDeliveryError(`Event stream failed: ${errorMessage(error)}`, {
        runId: this.runId,
        eventType: event.type,
      });
    }
  }

  /** Send on a path that is already failing; a delivery error is only logged. */
  async sendQuietly(event: RunEvent): Promise<void> {
    try {
      await this.send(event);
    } catch (error) {
      logger.warn({ runId: this.runId, error: errorMessage(error) }, 'Dropped run event');
    }
  }
}

export class GraphExecutor extends EventEmitter<{
  event: (event: RunEvent, runId: string) => void;
}> {
  private defaultMaxIterations: number;
  private snapshotExcludeKeys: ReadonlySet<string>;

  constructor(
    private tools: ToolRegistry,
    config: GraphEngineConfig = {}
  ) {
    super();
    this.defaultMaxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.snapshotExcludeKeys = new Set(config.snapshotExcludeKeys ?? DEFAULT_SNAPSHOT_EXCLUDE_KEYS);
  }

  /**
   * Walk the graph from its start node until END, the iteration cap, a
   * cancellation, or a failure. A failure is recorded on the run and then
   * rethrown.
   */
  async execute(graph: CompiledGraph, run: RunHandle, options: ExecuteOptions = {}): Promise<RunRecord> {
    const { signal } = options;
    const events = new EventDelivery(this, run.runId, options.sink);
    let state = run.state();
    const maxIterations = this.resolveMaxIterations(state);
    let failedNode: string | undefined;

    logger.info({ runId: run.runId, graphId: graph.id, maxIterations }, 'Starting graph execution');

    try {
      run.markRunning();
      await events.send({
        type: 'status',
        run_id: run.runId,
        graph_id: graph.id,
        status: 'running',
        timestamp: now(),
      });

      let current = resolveStartNode(graph);
      let iteration = 0;
      let cancelled = false;

      while (current !== undefined && current !== END) {
        await yieldToEventLoop();

        if (signal?.aborted) {
          run.appendLog(SYSTEM_NODE, 'terminated', { reason: CANCELLED_REASON });
          await events.send({ type: 'system', reason: CANCELLED_REASON, timestamp: now() });
          cancelled = true;
          break;
        }

        iteration++;
        if (iteration > maxIterations) {
          logger.warn({ runId: run.runId, maxIterations }, 'Iteration cap reached');
          run.appendLog(SYSTEM_NODE, 'terminated', { reason: MAX_ITERATIONS_REASON });
          await events.send({ type: 'system', reason: MAX_ITERATIONS_REASON, timestamp: now() });
          break;
        }

        run.enterNode(current, iteration);
        await events.send({ type: 'node_start', node: current, iteration, timestamp: now() });

        let step: StepResult;
        try {
          step = await this.executeNode(graph, current, state, run.runId);
        } catch (error) {
          failedNode = current;
          run.appendLog(current, 'failed', { error: errorMessage(error) });
          throw error;
        }

        state = step.state;
        run.replaceState(state);
        run.appendLog(current, 'completed', {
          function: step.function,
          duration_ms: step.durationMs,
        });
        await events.send({
          type: 'node_complete',
          node: current,
          function: step.function,
          duration_ms: step.durationMs,
          state: this.snapshotState(state),
          timestamp: now(),
        });

        const next = nextNode(graph, current, state);
        await events.send({ type: 'transition', from: current, to: next, timestamp: now() });
        current = next;
      }

      const record = cancelled ? run.cancel() : run.complete();
      logger.info(
        { runId: run.runId, status: record.status, iterations: record.iterations },
        'Graph execution finished'
      );

      await events.send({
        type: 'complete',
        run_id: run.runId,
        status: record.status,
        final_state: record.state,
        execution_log: record.executionLog,
        timestamp: now(),
      });
      return record;
    } catch (error) {
      const message = errorMessage(error);

      if (isTerminalStatus(run.status)) {
        // Only the final event can fail after the record is committed.
        logger.warn({ runId: run.runId, error: message }, 'Run finished but its event stream failed');
        throw error;
      }

      run.fail(message);
      logger.error({ runId: run.runId, node: failedNode, error: message }, 'Graph execution failed');

      if (failedNode !== undefined) {
        await events.sendQuietly({
          type: 'node_error',
          node: failedNode,
          error: message,
          timestamp: now(),
        });
      }
      await events.sendQuietly({
        type: 'error',
        run_id: run.runId,
        error: message,
        message: 'Workflow execution failed',
        timestamp: now(),
      });
      throw error;
    }
  }

  private async executeNode(
    graph: CompiledGraph,
    node: string,
    state: RunState,
    runId: string
  ): Promise<StepResult> {
    const config = graph.nodes.get(node);
    if (!config) {
      throw new NodeNotFoundError(node, { graphId: graph.id });
    }

    const tool = this.tools.get(config.function);

    logger.debug({ runId, node, tool: config.function }, 'Executing node');

    const startedAt = performance.now();
    let result: unknown;
    try {
      result = await tool(structuredClone(state), {
        runId,
        node,
        params: structuredClone(config.params),
      });
    } catch (error) {
      throw new ToolExecutionError(
        `Tool '${config.function}' failed at node ${node}: ${errorMessage(error)}`,
        { tool: config.function, node }
      );
    }
    const durationMs = Math.round((performance.now() - startedAt) * 1000) / 1000;

    if (!isPlainObject(result)) {
      throw new ToolExecutionError(
        `Tool '${config.function}' at node ${node} did not return a state object`,
        { tool: config.function, node }
      );
    }

    return { state: result, function: config.function, durationMs };
  }

  private resolveMaxIterations(state: RunState): number {
    const value = state.max_iterations;
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    return this.defaultMaxIterations;
  }

  private snapshotState(state: RunState): RunState {
    return Object.fromEntries(
      Object.entries(state).filter(([key]) => !this.snapshotExcludeKeys.has(key))
    );
  }
}
