import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import type { FastifyInstance } from 'fastify';
import { WebSocket, WebSocketServer } from 'ws';
import type { RawData } from 'ws';
import { StreamRequestSchema } from '@graphrun/schemas';
import type { StreamMessage, StreamRequest } from '@graphrun/schemas';
import type { GraphEngine } from '@graphrun/graph-engine';
import { ValidationError, createLogger, errorMessage } from '@graphrun/shared';

const logger = createLogger({ name: 'stream-route' });

const STREAM_PATH = /^\/ws\/graph\/run\/([^/?#]+)\/?(?:\?.*)?$/;

function now(): string {
  return new Date().toISOString();
}

export function matchStreamPath(url: string | undefined): string | undefined {
  const match = url ? STREAM_PATH.exec(url) : null;
  if (!match) {
    return undefined;
  }
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return undefined;
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

export function parseStreamRequest(raw: string): StreamRequest {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new ValidationError('Invalid JSON message');
  }

  const parsed = StreamRequestSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError('Invalid stream request', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

function receiveMessage(socket: WebSocket): Promise<string> {
  return new Promise((resolve, reject) => {
    const onMessage = (data: RawData): void => {
      cleanup();
      resolve(rawToString(data));
    };
    const onClose = (): void => {
      cleanup();
      reject(new Error('Connection closed before a run request was received'));
    };
    const cleanup = (): void => {
      socket.off('message', onMessage);
      socket.off('close', onClose);
    };

    socket.on('message', onMessage);
    socket.on('close', onClose);
  });
}

function sendMessage(socket: WebSocket, message: StreamMessage): Promise<void> {
  return new Promise((resolve, reject) => {
    if (socket.readyState !== WebSocket.OPEN) {
      reject(new Error('WebSocket is not open'));
      return;
    }
    socket.send(JSON.stringify(message), (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

async function sendError(socket: WebSocket, graphId: string, error: unknown): Promise<void> {
  try {
    await sendMessage(socket, {
      type: 'error',
      error: errorMessage(error),
      message: 'Failed to start streaming run',
      timestamp: now(),
    });
  } catch (sendFailure) {
    logger.warn({ graphId, error: errorMessage(sendFailure) }, 'Could not deliver error frame');
  }
}

function closeSocket(socket: WebSocket, code: number, reason: string): void {
  if (socket.readyState === WebSocket.OPEN) {
    socket.close(code, reason);
  }
}

/**
 * One streamed run per connection: read `{initial_state}`, acknowledge,
 * forward every run event as a text frame, then close.
 */
export async function handleRunStream(
  socket: WebSocket,
  graphId: string,
  engine: GraphEngine
): Promise<void> {
  let request: StreamRequest;
  try {
    request = parseStreamRequest(await receiveMessage(socket));
    engine.requireGraph(graphId);
  } catch (error) {
    logger.warn({ graphId, error: errorMessage(error) }, 'Rejected streaming run');
    await sendError(socket, graphId, error);
    closeSocket(socket, 1008, 'Invalid run request');
    return;
  }

  try {
    await sendMessage(socket, {
      type: 'connected',
      graph_id: graphId,
      message: `Connected to graph ${graphId}`,
      timestamp: now(),
    });

    const record = await engine.runGraph(graphId, request.initial_state, {
      mode: 'stream',
      sink: (event) => sendMessage(socket, event),
    });
    logger.info({ graphId, runId: record.runId, status: record.status }, 'Streaming run finished');
  } catch (error) {
    // The run's own error event has already gone out through the sink.
    logger.warn({ graphId, error: errorMessage(error) }, 'Streaming run ended with an error');
  } finally {
    closeSocket(socket, 1000, 'Run finished');
  }
}

/** Serve `/ws/graph/run/:graphId` upgrades on the Fastify HTTP server. */
export function registerRunStream(server: FastifyInstance): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  server.server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const graphId = matchStreamPath(request.url);
    if (graphId === undefined) {
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      logger.info({ graphId }, 'Stream client connected');
      // ws closes the connection itself after a protocol error.
      ws.on('error', (error) => {
        logger.warn({ graphId, error: errorMessage(error) }, 'Stream socket error');
      });
      handleRunStream(ws, graphId, server.graphEngine).catch((error: unknown) => {
        logger.error({ graphId, error: errorMessage(error) }, 'Stream handler failed');
      });
    });
  });

  // Fastify may call the hook once per plugin context; close the socket server once.
  let closing: Promise<void> | undefined;
  const closeStreams = (): Promise<void> => {
    closing ??= new Promise<void>((resolve, reject) => {
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close((error) => (error ? reject(error) : resolve()));
    });
    return closing;
  };

  server.addHook('preClose', async () => {
    await closeStreams();
  });

  return wss;
}
