import { nanoid } from 'nanoid';
import { isTerminalStatus } from '@graphrun/schemas';
import type { LogEntry, LogEntryStatus, RunMode, RunStatus } from '@graphrun/schemas';
import { RunNotFoundError, RunStateError, createLogger } from '@graphrun/shared';
import type { RunState } from '@graphrun/shared';
import { InMemoryRunStore } from '../store/run-store';
import type { RunStore } from '../store/run-store';
import type { RunRecord } from '../types';

const logger = createLogger({ name: 'run-registry' });

export interface StartRunOptions {
  mode?: RunMode;
  /** Queue the run (status `pending`) instead of marking it running. */
  pending?: boolean;
}

/**
 * The only writer of one run's record. A handle is created when the run is
 * registered and is owned by the traversal that executes the run.
 */
export class RunHandle {
  constructor(
    private store: RunStore,
    readonly runId: string
  ) {}

  get status(): RunStatus {
    return this.current().status;
  }

  /** A copy of the record as it is now. */
  snapshot(): RunRecord {
    return structuredClone(this.current());
  }

  state(): RunState {
    return structuredClone(this.current().state);
  }

  markRunning(): void {
    if (this.current().status === 'running') {
      return;
    }
    this.write({ status: 'running' });
  }

  enterNode(node: string, iteration: number): void {
    this.write({ currentNode: node, iterations: iteration });
  }

  /** Swap in the state a node returned; the previous state is dropped. */
  replaceState(state: RunState): void {
    this.write({ state: structuredClone(state) });
  }

  appendLog(node: string, status: LogEntryStatus, details: Record<string, unknown> = {}): LogEntry {
    const record = this.current();
    const entry: LogEntry = {
      node,
      status,
      timestamp: this.nextTimestamp(record.executionLog),
      details: structuredClone(details),
    };
    this.write({ executionLog: [...record.executionLog, entry] });
    return entry;
  }

  complete(): RunRecord {
    return this.finish({ status: 'completed', currentNode: null });
  }

  cancel(): RunRecord {
    return this.finish({ status: 'cancelled', currentNode: null });
  }

  fail(error: string): RunRecord {
    return this.finish({ status: 'failed', error });
  }

  private finish(patch: Partial<RunRecord>): RunRecord {
    this.write({ ...patch, endTime: new Date().toISOString() });
    const record = this.snapshot();
    logger.info({ runId: this.runId, status: record.status }, 'Run finished');
    return record;
  }

  // Entries within a run never go back in time, even if the wall clock does.
  private nextTimestamp(log: LogEntry[]): string {
    const now = Date.now();
    const last = log.length > 0 ? Date.parse(log[log.length - 1].timestamp) : now;
    return new Date(Math.max(now, last)).toISOString();
  }

  private current(): RunRecord {
    const record = this.store.get(this.runId);
    if (!record) {
      throw new RunNotFoundError(this.runId);
    }
    return record;
  }

  private write(patch: Partial<RunRecord>): void {
    const record = this.current();
    if (isTerminalStatus(record.status)) {
      throw new RunStateError(`Run ${this.runId} is already ${record.status}`, {
        runId: this.runId,
        status: record.status,
      });
    }
    this.store.save({ ...record, ...patch });
  }
}

export class RunRegistry {
  constructor(private store: RunStore = new InMemoryRunStore()) {}

  start(graphId: string, initialState: RunState, options: StartRunOptions = {}): RunHandle {
    const runId = nanoid();
    const record: RunRecord = {
      runId,
      graphId,
      status: options.pending ? 'pending' : 'running',
      mode: options.mode ?? 'sync',
      currentNode: null,
      state: structuredClone(initialState),
      executionLog: [],
      iterations: 0,
      startTime: new Date().toISOString(),
      endTime: null,
      error: null,
    };

    this.store.save(record);
    logger.info({ runId, graphId, status: record.status, mode: record.mode }, 'Run registered');

    return new RunHandle(this.store, runId);
  }

  get(runId: string): RunRecord | undefined {
    const record = this.store.get(runId);
    return record ? structuredClone(record) : undefined;
  }

  require(runId: string): RunRecord {
    const record = this.get(runId);
    if (!record) {
      throw new RunNotFoundError(runId);
    }
    return record;
  }

  list(): RunRecord[] {
    return this.store.list().map((record) => structuredClone(record));
  }
}
