import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FastifyInstance } from 'fastify';
import { CODE_REVIEW_GRAPH, EXAMPLE_INITIAL_STATE } from '@graphrun/code-review';
import type { GraphDefinitionInput } from '@graphrun/schemas';
import { loadConfig } from './config';
import { createEngine, createServer } from './server';

const LINEAR_GRAPH: GraphDefinitionInput = {
  name: 'linear',
  nodes: {
    A: { function: 'identity' },
    B: { function: 'identity' },
  },
  edges: { A: 'B' },
};

describe('Graph Service Server', () => {
  let server: FastifyInstance;
  let releaseHold: () => void = () => {};

  beforeEach(async () => {
    const config = loadConfig({ LOG_LEVEL: 'silent' });
    const engine = createEngine(config);
    const hold = new Promise<void>((resolve) => {
      releaseHold = resolve;
    });

    engine.tools.register('identity', (state) => state);
    engine.tools.register('hold', async (state) => {
      await hold;
      return state;
    });

    server = await createServer({ config, engine });
  });

  afterEach(async () => {
    releaseHold();
    await server.close();
  });

  async function createGraph(definition: GraphDefinitionInput): Promise<string> {
    const response = await server.inject({
      method: 'POST',
      url: '/graph/create',
      payload: definition,
    });
    expect(response.statusCode).toBe(201);
    return JSON.parse(response.body).graph_id;
  }

  describe('Service info', () => {
    it('should respond to health check', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/health',
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('healthy');
      expect(body.active_background_runs).toBe(0);
      expect(body.features.websocket_streaming).toBe(true);
    });

    it('should list registered tools', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/tools',
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.tools).toEqual([
        'extract_functions',
        'check_complexity',
        'detect_issues',
        'suggest_improvements',
        'check_quality_score',
        'identity',
        'hold',
      ]);
    });
  });

  describe('Graphs', () => {
    it('should create a graph and return its definition', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/graph/create',
        payload: {
          name: 'branching',
          nodes: { check: { function: 'identity' } },
          conditional_edges: {
            check: { condition: 'score > 5', true: 'END', false: 'check' },
          },
        },
      });

      expect(response.statusCode).toBe(201);
      const created = JSON.parse(response.body);
      expect(created.message).toBe("Graph 'branching' created successfully");

      const fetched = await server.inject({
        method: 'GET',
        url: `/graph/${created.graph_id}`,
      });

      expect(fetched.statusCode).toBe(200);
      const body = JSON.parse(fetched.body);
      expect(body.graph_id).toBe(created.graph_id);
      expect(body.nodes).toEqual({ check: { function: 'identity', params: {} } });
      expect(body.edges).toEqual({});
      expect(body.conditional_edges).toEqual({
        check: { condition: 'score > 5', true_target: 'END', false_target: 'check' },
      });
    });

    it('should list created graphs', async () => {
      const graphId = await createGraph(LINEAR_GRAPH);

      const response = await server.inject({
        method: 'GET',
        url: '/graph',
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.graphs).toHaveLength(1);
      expect(body.graphs[0]).toMatchObject({ graph_id: graphId, name: 'linear', node_count: 2 });
    });

    it('should reject a graph without nodes', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/graph/create',
        payload: { name: 'broken' },
      });

      expect(response.statusCode).toBe(400);
      const body = JSON.parse(response.body);
      expect(body.error.code).toBe('VALIDATION_ERROR');
    });

    it('should return 404 for an unknown graph', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/graph/missing',
      });

      expect(response.statusCode).toBe(404);
      const body = JSON.parse(response.body);
      expect(body.error.code).toBe('GRAPH_NOT_FOUND');
      expect(body.error.message).toBe('Graph missing not found');
    });
  });

  describe('Synchronous runs', () => {
    it('should run a graph to completion', async () => {
      const graphId = await createGraph(LINEAR_GRAPH);

      const response = await server.inject({
        method: 'POST',
        url: '/graph/run',
        payload: { graph_id: graphId, initial_state: { value: 1 } },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('completed');
      expect(body.final_state).toEqual({ value: 1 });
      expect(body.execution_log.map((entry: { node: string }) => entry.node)).toEqual(['A', 'B']);
      expect(body.execution_log[0].details.function).toBe('identity');
    });

    it('should return 404 when running an unknown graph', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/graph/run',
        payload: { graph_id: 'missing' },
      });

      expect(response.statusCode).toBe(404);
    });

    it('should report a failed run with its run id', async () => {
      const graphId = await createGraph({
        name: 'broken-tool',
        nodes: { only: { function: 'no_such_tool' } },
      });

      const response = await server.inject({
        method: 'POST',
        url: '/graph/run',
        payload: { graph_id: graphId },
      });

      expect(response.statusCode).toBe(500);
      const body = JSON.parse(response.body);
      expect(body.error.code).toBe('TOOL_NOT_FOUND');
      expect(body.error.message).toBe("Tool 'no_such_tool' not found in registry");

      const runId = body.error.metadata.runId;
      const state = await server.inject({
        method: 'GET',
        url: `/graph/state/${runId}`,
      });

      expect(state.statusCode).toBe(200);
      const record = JSON.parse(state.body);
      expect(record.status).toBe('failed');
      expect(record.error).toBe("Tool 'no_such_tool' not found in registry");
      expect(record.execution_log).toHaveLength(1);
      expect(record.execution_log[0]).toMatchObject({ node: 'only', status: 'failed' });
    });

    it('should run the code review workflow', async () => {
      const graphId = await createGraph(CODE_REVIEW_GRAPH);

      const response = await server.inject({
        method: 'POST',
        url: '/graph/run',
        payload: { graph_id: graphId, initial_state: { ...EXAMPLE_INITIAL_STATE, max_iterations: 5 } },
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('completed');
      expect(body.final_state.quality_score).toBe(8.5);
      expect(body.execution_log.map((entry: { node: string }) => entry.node)).toEqual([
        'extract',
        'analyze',
        'detect',
        'suggest',
        'check_quality',
      ]);
    });
  });

  describe('Background runs', () => {
    it('should start a background run and report its status', async () => {
      const graphId = await createGraph(LINEAR_GRAPH);

      const response = await server.inject({
        method: 'POST',
        url: '/graph/run/background',
        payload: { graph_id: graphId },
      });

      expect(response.statusCode).toBe(202);
      const body = JSON.parse(response.body);
      expect(body.status_endpoint).toBe(`/graph/background/${body.run_id}/status`);

      await server.backgroundTasks.wait(body.run_id);

      const status = await server.inject({
        method: 'GET',
        url: body.status_endpoint,
      });

      expect(status.statusCode).toBe(200);
      expect(JSON.parse(status.body)).toEqual({
        run_id: body.run_id,
        task_status: 'completed',
        workflow_status: 'completed',
        current_node: null,
      });
    });

    it('should return 404 for an unknown background task', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/graph/background/missing/status',
      });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error.code).toBe('RUN_NOT_FOUND');
    });
  });

  describe('Cancellation', () => {
    it('should cancel an active run', async () => {
      const graphId = await createGraph({
        name: 'held',
        nodes: { wait: { function: 'hold' } },
        edges: { wait: 'wait' },
      });

      const started = await server.inject({
        method: 'POST',
        url: '/graph/run/background',
        payload: { graph_id: graphId, initial_state: { max_iterations: 5 } },
      });
      const { run_id: runId } = JSON.parse(started.body);

      const response = await server.inject({
        method: 'POST',
        url: `/graph/run/${runId}/cancel`,
      });

      expect(response.statusCode).toBe(202);
      expect(JSON.parse(response.body)).toEqual({ run_id: runId, status: 'cancelling' });

      releaseHold();
      const record = await server.backgroundTasks.wait(runId);

      expect(record.status).toBe('cancelled');
      expect(record.executionLog[record.executionLog.length - 1]).toMatchObject({
        node: 'SYSTEM',
        status: 'terminated',
        details: { reason: 'cancelled' },
      });
    });

    it('should refuse to cancel a finished run', async () => {
      const graphId = await createGraph(LINEAR_GRAPH);
      const run = await server.inject({
        method: 'POST',
        url: '/graph/run',
        payload: { graph_id: graphId },
      });
      const { run_id: runId } = JSON.parse(run.body);

      const response = await server.inject({
        method: 'POST',
        url: `/graph/run/${runId}/cancel`,
      });

      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body).error.code).toBe('RUN_STATE_ERROR');
    });

    it('should return 404 when cancelling an unknown run', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/graph/run/missing/cancel',
      });

      expect(response.statusCode).toBe(404);
    });
  });
});
