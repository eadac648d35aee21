import { WebSocket } from 'ws';
import { z } from 'zod';
import {
  BackgroundRunResponseSchema,
  BackgroundStatusResponseSchema,
  GraphCreateResponseSchema,
  GraphSummarySchema,
  RunResponseSchema,
  StateResponseSchema,
  StreamMessageSchema,
} from '@graphrun/schemas';
import type { StreamMessage } from '@graphrun/schemas';
import type { RunState } from '@graphrun/shared';
import { GraphRunError, createLogger, errorMessage } from '@graphrun/shared';
import { getConfigManager } from '../config/index.js';

const logger = createLogger({ name: 'cli-api' });

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

interface RequestOptions {
  method: 'GET' | 'POST';
  body?: unknown;
}

const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export const GraphListResponseSchema = z.object({
  graphs: z.array(GraphSummarySchema),
});

export const ToolListResponseSchema = z.object({
  tools: z.array(z.string()),
});

export const CancelResponseSchema = z.object({
  run_id: z.string(),
  status: z.string(),
});

/** An error response from the graph service. */
export class ApiError extends GraphRunError {
  constructor(message: string, code: string, statusCode: number) {
    super(message, code, statusCode);
  }
}

export class APIClient {
  private baseUrl: string;

  constructor(serviceUrl: string) {
    this.baseUrl = serviceUrl.replace(/\/+$/, '');
  }

  async request<T>(path: string, schema: Schema<T>, init: RequestOptions): Promise<T> {
    const url = `${this.baseUrl}${path}`;

    const response = await fetch(url, {
      method: init.method,
      ...(init.body !== undefined && {
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(init.body),
      }),
    });

    const body: unknown = await response.json().catch(() => undefined);

    if (!response.ok) {
      const envelope = ErrorEnvelopeSchema.safeParse(body);
      if (envelope.success) {
        throw new ApiError(envelope.data.error.message, envelope.data.error.code, response.status);
      }
      throw new ApiError(`HTTP ${response.status}: ${response.statusText}`, 'HTTP_ERROR', response.status);
    }

    return schema.parse(body);
  }

  async get<T>(path: string, schema: Schema<T>): Promise<T> {
    return this.request(path, schema, { method: 'GET' });
  }

  async post<T>(path: string, schema: Schema<T>, body?: unknown): Promise<T> {
    return this.request(path, schema, { method: 'POST', body });
  }

  listTools() {
    return this.get('/tools', ToolListResponseSchema);
  }

  listGraphs() {
    return this.get('/graph', GraphListResponseSchema);
  }

  createGraph(definition: unknown) {
    return this.post('/graph/create', GraphCreateResponseSchema, definition);
  }

  getGraph(graphId: string) {
    return this.get(`/graph/${encodeURIComponent(graphId)}`, z.record(z.unknown()));
  }

  runGraph(graphId: string, initialState: RunState) {
    return this.post('/graph/run', RunResponseSchema, {
      graph_id: graphId,
      initial_state: initialState,
    });
  }

  runInBackground(graphId: string, initialState: RunState) {
    return this.post('/graph/run/background', BackgroundRunResponseSchema, {
      graph_id: graphId,
      initial_state: initialState,
    });
  }

  getState(runId: string) {
    return this.get(`/graph/state/${encodeURIComponent(runId)}`, StateResponseSchema);
  }

  getBackgroundStatus(runId: string) {
    return this.get(
      `/graph/background/${encodeURIComponent(runId)}/status`,
      BackgroundStatusResponseSchema
    );
  }

  cancelRun(runId: string) {
    return this.post(`/graph/run/${encodeURIComponent(runId)}/cancel`, CancelResponseSchema);
  }

  /**
   * Run a graph over the streaming endpoint. Resolves when the service
   * closes the connection.
   */
  streamRun(
    graphId: string,
    initialState: RunState,
    onMessage: (message: StreamMessage) => void
  ): Promise<void> {
    const url = new URL(`/ws/graph/run/${encodeURIComponent(graphId)}`, this.baseUrl);
    url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url);

      socket.on('open', () => {
        socket.send(JSON.stringify({ initial_state: initialState }));
      });

      socket.on('message', (data) => {
        try {
          onMessage(StreamMessageSchema.parse(JSON.parse(data.toString())));
        } catch (error) {
          logger.warn({ graphId, error: errorMessage(error) }, 'Ignoring malformed stream message');
        }
      });

      socket.on('close', () => resolve());
      socket.on('error', reject);
    });
  }
}

export function createServiceClient(): APIClient {
  return new APIClient(getConfigManager().get().serviceUrl);
}
