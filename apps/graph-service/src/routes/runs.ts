import { FastifyPluginAsync } from 'fastify';
import { RunRequestSchema } from '@graphrun/schemas';
import type { BackgroundRunResponse, RunRequest } from '@graphrun/schemas';
import { GraphRunError, RunNotFoundError, RunStateError, createLogger, errorMessage } from '@graphrun/shared';
import { toBackgroundStatusResponse, toRunResponse, toStateResponse } from '../presenters';

const logger = createLogger({ name: 'runs-route' });

export const runRoutes: FastifyPluginAsync = async (server) => {
  const { graphEngine, backgroundTasks } = server;

  // Run a graph and wait for it to finish
  server.post<{
    Body: RunRequest;
  }>(
    '/run',
    {
      schema: {
        body: RunRequestSchema,
      },
    },
    async (request) => {
      const { graph_id: graphId, initial_state: initialState } = request.body;
      const prepared = graphEngine.prepareRun(graphId, initialState, { mode: 'sync' });
      const { runId } = prepared.run;

      logger.info({ graphId, runId }, 'Running graph');

      try {
        const record = await graphEngine.executeRun(prepared);
        return toRunResponse(record);
      } catch (error) {
        if (error instanceof GraphRunError) {
          error.metadata = { ...error.metadata, runId };
          throw error;
        }
        throw new GraphRunError(errorMessage(error), 'RUN_FAILED', 500, { runId });
      }
    }
  );

  // Run a graph in the background
  server.post<{
    Body: RunRequest;
  }>(
    '/run/background',
    {
      schema: {
        body: RunRequestSchema,
      },
    },
    async (request, reply) => {
      const { graph_id: graphId, initial_state: initialState } = request.body;
      const runId = backgroundTasks.startBackground(graphId, initialState);

      const response: BackgroundRunResponse = {
        run_id: runId,
        message: 'Graph execution started in background',
        status_endpoint: `/graph/background/${runId}/status`,
      };
      return reply.status(202).send(response);
    }
  );

  // Cancel an active run
  server.post<{
    Params: { runId: string };
  }>('/run/:runId/cancel', async (request, reply) => {
    const { runId } = request.params;
    const record = graphEngine.getRun(runId);

    if (!record) {
      throw new RunNotFoundError(runId);
    }
    if (!graphEngine.cancelRun(runId)) {
      throw new RunStateError(`Run ${runId} is not active`, { runId, status: record.status });
    }

    return reply.status(202).send({ run_id: runId, status: 'cancelling' });
  });

  // Get run state
  server.get<{
    Params: { runId: string };
  }>('/state/:runId', async (request) => {
    const { runId } = request.params;
    const record = graphEngine.getRun(runId);

    if (!record) {
      throw new RunNotFoundError(runId);
    }
    return toStateResponse(record);
  });

  // Get background task status
  server.get<{
    Params: { runId: string };
  }>('/background/:runId/status', async (request) => {
    const { runId } = request.params;
    const task = backgroundTasks.status(runId);

    if (task.status === 'not_found') {
      throw new RunNotFoundError(runId);
    }
    return toBackgroundStatusResponse(runId, task, graphEngine.getRun(runId));
  });
};
