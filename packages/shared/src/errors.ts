export class GraphRunError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends GraphRunError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, metadata);
  }
}

export class NotFoundError extends GraphRunError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 404, metadata);
  }
}

export class ConfigurationError extends GraphRunError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, metadata);
  }
}

export class GraphNotFoundError extends GraphRunError {
  constructor(graphId: string) {
    super(`Graph ${graphId} not found`, 'GRAPH_NOT_FOUND', 404, { graphId });
  }
}

export class RunNotFoundError extends GraphRunError {
  constructor(runId: string) {
    super(`Run ${runId} not found`, 'RUN_NOT_FOUND', 404, { runId });
  }
}

export class NodeNotFoundError extends GraphRunError {
  constructor(node: string, metadata?: Record<string, unknown>) {
    super(`Node ${node} not found in graph`, 'NODE_NOT_FOUND', 500, { node, ...metadata });
  }
}

export class ToolNotFoundError extends GraphRunError {
  constructor(tool: string, metadata?: Record<string, unknown>) {
    super(`Tool '${tool}' not found in registry`, 'TOOL_NOT_FOUND', 500, { tool, ...metadata });
  }
}

export class ToolExecutionError extends GraphRunError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'TOOL_EXECUTION_ERROR', 500, metadata);
  }
}

/**
 * Raised while evaluating an edge condition. The evaluator catches it and
 * routes to the false branch, so it is never seen by callers of a run.
 */
export class ConditionEvaluationError extends GraphRunError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'CONDITION_EVALUATION_ERROR', 500, metadata);
  }
}

export class RunStateError extends GraphRunError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'RUN_STATE_ERROR', 409, metadata);
  }
}

export class EventDeliveryError extends GraphRunError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 'EVENT_DELIVERY_ERROR', 500, metadata);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
