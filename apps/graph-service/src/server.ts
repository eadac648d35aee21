import Fastify, { FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifySensible from '@fastify/sensible';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { BackgroundTaskManager, GraphEngine } from '@graphrun/graph-engine';
import { registerCodeReviewTools } from '@graphrun/code-review';
import { loggerOptions } from '@graphrun/shared';
import { loadConfig } from './config';
import type { ServiceConfig } from './config';
import errorHandler from './plugins/error-handler';
import { graphRoutes } from './routes/graphs';
import { runRoutes } from './routes/runs';
import { registerRunStream } from './routes/stream';

export const SERVICE_NAME = 'graph-service';
export const SERVICE_VERSION = '0.1.0';

export interface ServerOptions {
  config?: ServiceConfig;
  /** Engine to serve; by default one is built with the code review tools registered. */
  engine?: GraphEngine;
}

export function createEngine(config: ServiceConfig): GraphEngine {
  const engine = new GraphEngine({
    maxIterations: config.maxIterations,
    snapshotExcludeKeys: config.snapshotExcludeKeys,
  });
  registerCodeReviewTools(engine.tools);
  return engine;
}

export async function createServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? loadConfig();
  const engine = options.engine ?? createEngine(config);

  const server = Fastify({
    logger: loggerOptions({ name: SERVICE_NAME, level: config.logLevel }),
    requestIdLogLabel: 'requestId',
  });

  // Set up Zod schema validation
  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  await server.register(fastifyCors, { origin: config.corsOrigin });
  await server.register(fastifySensible);
  await server.register(errorHandler);

  server.decorate('graphEngine', engine);
  server.decorate('backgroundTasks', new BackgroundTaskManager(engine));

  server.get('/', async () => ({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    features: ['sync-runs', 'background-runs', 'websocket-streaming', 'cancellation'],
  }));

  server.get('/health', async () => ({
    status: 'healthy',
    active_background_runs: server.backgroundTasks.activeCount(),
    features: {
      background_runs: true,
      websocket_streaming: true,
      cancellation: true,
    },
  }));

  server.get('/tools', async () => ({
    tools: engine.tools.list(),
  }));

  await server.register(graphRoutes, { prefix: '/graph' });
  await server.register(runRoutes, { prefix: '/graph' });
  registerRunStream(server);

  return server;
}

declare module 'fastify' {
  interface FastifyInstance {
    graphEngine: GraphEngine;
    backgroundTasks: BackgroundTaskManager;
  }
}

export { loadConfig } from './config';
export type { ServiceConfig } from './config';
