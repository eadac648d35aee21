import type { RunRecord } from '../types';

/**
 * Backing map for run records. Records are replaced, never edited in place;
 * the run registry hands out copies to readers.
 */
export interface RunStore {
  save(record: RunRecord): void;
  get(runId: string): RunRecord | undefined;
  list(): RunRecord[];
}

export class InMemoryRunStore implements RunStore {
  private runs: Map<string, RunRecord> = new Map();

  save(record: RunRecord): void {
    this.runs.set(record.runId, record);
  }

  get(runId: string): RunRecord | undefined {
    return this.runs.get(runId);
  }

  list(): RunRecord[] {
    return [...this.runs.values()];
  }
}
