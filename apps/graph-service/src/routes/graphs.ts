import { FastifyPluginAsync } from 'fastify';
import { GraphDefinitionSchema } from '@graphrun/schemas';
import type { GraphCreateResponse, GraphDefinition } from '@graphrun/schemas';
import { createLogger } from '@graphrun/shared';
import { toGraphResponse, toGraphSummary } from '../presenters';

const logger = createLogger({ name: 'graphs-route' });

export const graphRoutes: FastifyPluginAsync = async (server) => {
  const { graphEngine } = server;

  // List graphs
  server.get('/', async () => {
    return {
      graphs: graphEngine.graphs.list().map(toGraphSummary),
    };
  });

  // Create graph
  server.post<{
    Body: GraphDefinition;
  }>(
    '/create',
    {
      schema: {
        body: GraphDefinitionSchema,
      },
    },
    async (request, reply) => {
      const graphId = graphEngine.createGraph(request.body);

      logger.info({ graphId, name: request.body.name }, 'Graph created');

      const response: GraphCreateResponse = {
        graph_id: graphId,
        message: `Graph '${request.body.name}' created successfully`,
      };
      return reply.status(201).send(response);
    }
  );

  // Get graph
  server.get<{
    Params: { graphId: string };
  }>('/:graphId', async (request) => {
    return toGraphResponse(graphEngine.requireGraph(request.params.graphId));
  });
};
