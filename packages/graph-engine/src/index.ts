// Engine
export { GraphEngine } from './engine/engine';
export type { GraphEngineOptions, PreparedRun, PrepareRunOptions } from './engine/engine';
export { GraphExecutor, MAX_ITERATIONS_REASON, CANCELLED_REASON } from './engine/executor';

// Background execution
export { BackgroundTaskManager } from './background/task-manager';
export type { BackgroundTaskStatus } from './background/task-manager';

// Graphs
export { compileGraph } from './graph/compile';
export { resolveStartNode } from './graph/start-node';
export { nextNode } from './graph/routing';
export { InMemoryGraphStore } from './store/graph-store';
export type { GraphStore } from './store/graph-store';

// Runs
export { RunRegistry, RunHandle } from './runs/run-registry';
export type { StartRunOptions } from './runs/run-registry';
export { InMemoryRunStore } from './store/run-store';
export type { RunStore } from './store/run-store';

// Tools
export { ToolRegistry } from './tools/registry';
export type { ToolDescriptor } from './tools/registry';

// Conditions
export * from './conditions';

// Types
export { END, SYSTEM_NODE, DEFAULT_MAX_ITERATIONS, DEFAULT_SNAPSHOT_EXCLUDE_KEYS } from './types';
export type {
  CompiledGraph,
  CompiledConditionalEdge,
  RunRecord,
  Tool,
  ToolContext,
  RunEventSink,
  RunEventListener,
  ExecuteOptions,
  GraphEngineConfig,
} from './types';
