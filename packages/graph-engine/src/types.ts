import type { GraphDefinition, LogEntry, NodeConfig, RunEvent, RunMode, RunStatus } from '@graphrun/schemas';
import type { RunState } from '@graphrun/shared';
import type { CompiledCondition } from './conditions/ast';

/** Target that ends a run when an edge points at it. */
export const END = 'END';

/** Pseudo-node used in the execution log for engine notices. */
export const SYSTEM_NODE = 'SYSTEM';

export const DEFAULT_MAX_ITERATIONS = 10;

export const DEFAULT_SNAPSHOT_EXCLUDE_KEYS: readonly string[] = ['code', 'max_iterations', 'threshold'];

export interface CompiledConditionalEdge {
  condition: CompiledCondition;
  trueTarget: string;
  falseTarget: string;
}

export interface CompiledGraph {
  id: string;
  name: string;
  description?: string;
  startNode?: string;
  /** Nodes in declaration order. */
  nodes: ReadonlyMap<string, Readonly<NodeConfig>>;
  edges: ReadonlyMap<string, string>;
  conditionalEdges: ReadonlyMap<string, CompiledConditionalEdge>;
  /** The definition as it was submitted, after schema defaults. */
  definition: Readonly<GraphDefinition>;
  createdAt: string;
}

export interface RunRecord {
  runId: string;
  graphId: string;
  status: RunStatus;
  mode: RunMode;
  currentNode: string | null;
  state: RunState;
  executionLog: LogEntry[];
  iterations: number;
  startTime: string;
  endTime: string | null;
  error: string | null;
}

export interface ToolContext {
  runId: string;
  node: string;
  params: Record<string, unknown>;
}

/** A registered capability: takes the state and returns its replacement. */
export type Tool = (state: RunState, context: ToolContext) => RunState | Promise<RunState>;

export type RunEventSink = (event: RunEvent) => void | Promise<void>;

export type RunEventListener = (event: RunEvent, runId: string) => void;

export interface ExecuteOptions {
  sink?: RunEventSink;
  signal?: AbortSignal;
}

export interface GraphEngineConfig {
  /** Iteration cap used when the initial state carries no usable `max_iterations`. */
  maxIterations?: number;
  /** State keys left out of `node_complete` snapshots. */
  snapshotExcludeKeys?: readonly string[];
}
