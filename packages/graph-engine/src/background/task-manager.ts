import { setImmediate as nextTick } from 'node:timers/promises';
import type { RunStatus, TaskStatus } from '@graphrun/schemas';
import { RunNotFoundError, createLogger, errorMessage } from '@graphrun/shared';
import type { RunState } from '@graphrun/shared';
import type { GraphEngine } from '../engine/engine';
import type { RunRecord } from '../types';

const logger = createLogger({ name: 'background-tasks' });

export type BackgroundTaskStatus =
  | { status: 'not_found' }
  | { status: Exclude<TaskStatus, 'failed'> }
  | { status: 'failed'; error: string };

const TASK_STATUS: Record<RunStatus, TaskStatus> = {
  pending: 'running',
  running: 'running',
  completed: 'completed',
  failed: 'failed',
  cancelled: 'cancelled',
};

/**
 * Runs graphs detached from the caller. Task status is read from the run
 * record, so a poller never sees the task and the record disagree.
 * Only in-flight runs keep their task promise; finished runs are answered
 * from the record alone.
 */
export class BackgroundTaskManager {
  private started: Set<string> = new Set();
  private inFlight: Map<string, Promise<void>> = new Map();

  constructor(private engine: GraphEngine) {}

  /** Queue a run and return its id without waiting for it to start. */
  startBackground(graphId: string, initialState: RunState): string {
    const prepared = this.engine.prepareRun(graphId, initialState, {
      mode: 'background',
      pending: true,
    });
    const { runId } = prepared.run;

    const done = nextTick()
      .then(() => this.engine.executeRun(prepared))
      .then(
        (record) => {
          logger.info({ runId, status: record.status }, 'Background run finished');
        },
        (error: unknown) => {
          logger.error({ runId, error: errorMessage(error) }, 'Background run failed');
        }
      )
      .finally(() => {
        this.inFlight.delete(runId);
      });

    this.started.add(runId);
    this.inFlight.set(runId, done);
    logger.info({ runId, graphId }, 'Background run scheduled');

    return runId;
  }

  status(runId: string): BackgroundTaskStatus {
    if (!this.started.has(runId)) {
      return { status: 'not_found' };
    }

    const record = this.engine.getRun(runId);
    if (!record) {
      return { status: 'not_found' };
    }

    const status = TASK_STATUS[record.status];
    if (status === 'failed') {
      return { status, error: record.error ?? 'Unknown error' };
    }
    return { status };
  }

  /** Resolve once the background run has finished, with its final record. */
  async wait(runId: string): Promise<RunRecord> {
    if (!this.started.has(runId)) {
      throw new RunNotFoundError(runId);
    }
    await this.inFlight.get(runId);
    return this.engine.runs.require(runId);
  }

  cancel(runId: string): boolean {
    return this.started.has(runId) && this.engine.cancelRun(runId);
  }

  has(runId: string): boolean {
    return this.started.has(runId);
  }

  /** Background runs that have not finished yet. */
  activeCount(): number {
    return this.inFlight.size;
  }
}
