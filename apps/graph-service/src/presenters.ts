import type {
  BackgroundStatusResponse,
  GraphDefinition,
  GraphSummary,
  RunResponse,
  StateResponse,
} from '@graphrun/schemas';
import type { BackgroundTaskStatus, CompiledGraph, RunRecord } from '@graphrun/graph-engine';

export type GraphResponse = GraphDefinition & { graph_id: string; created_at: string };

export function toGraphResponse(graph: CompiledGraph): GraphResponse {
  return {
    graph_id: graph.id,
    ...structuredClone(graph.definition),
    created_at: graph.createdAt,
  };
}

export function toGraphSummary(graph: CompiledGraph): GraphSummary {
  return {
    graph_id: graph.id,
    name: graph.name,
    node_count: graph.nodes.size,
    created_at: graph.createdAt,
  };
}

export function toRunResponse(record: RunRecord): RunResponse {
  return {
    run_id: record.runId,
    final_state: record.state,
    execution_log: record.executionLog,
    status: record.status,
  };
}

export function toStateResponse(record: RunRecord): StateResponse {
  return {
    run_id: record.runId,
    graph_id: record.graphId,
    status: record.status,
    current_node: record.currentNode,
    state: record.state,
    execution_log: record.executionLog,
    start_time: record.startTime,
    end_time: record.endTime,
    error: record.error,
  };
}

export function toBackgroundStatusResponse(
  runId: string,
  task: Exclude<BackgroundTaskStatus, { status: 'not_found' }>,
  record: RunRecord | undefined
): BackgroundStatusResponse {
  const response: BackgroundStatusResponse = { run_id: runId, task_status: task.status };

  if (record) {
    response.workflow_status = record.status;
    response.current_node = record.currentNode;
  }
  if (task.status === 'failed') {
    response.error = task.error;
  }
  return response;
}
