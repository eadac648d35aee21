import { describe, it, expect, afterEach, vi } from 'vitest';
import { RunNotFoundError, RunStateError } from '@graphrun/shared';
import { RunRegistry } from './run-registry';

describe('RunRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register running and pending runs', () => {
    const registry = new RunRegistry();

    const running = registry.start('g1', { a: 1 });
    const pending = registry.start('g1', {}, { pending: true, mode: 'background' });

    expect(registry.require(running.runId)).toMatchObject({
      graphId: 'g1',
      status: 'running',
      mode: 'sync',
      currentNode: null,
      state: { a: 1 },
      executionLog: [],
      iterations: 0,
      endTime: null,
      error: null,
    });
    expect(registry.require(pending.runId)).toMatchObject({ status: 'pending', mode: 'background' });
    expect(registry.list()).toHaveLength(2);
  });

  it('should hand out copies of records', () => {
    const registry = new RunRegistry();
    const run = registry.start('g1', { nested: { value: 1 } });

    const copy = registry.require(run.runId);
    copy.state.nested = 'changed';

    expect(registry.require(run.runId).state).toEqual({ nested: { value: 1 } });
  });

  it('should record node progress and state replacement', () => {
    const registry = new RunRegistry();
    const run = registry.start('g1', { old: true });

    run.enterNode('a', 1);
    run.replaceState({ fresh: true });
    run.appendLog('a', 'completed', { function: 'f', duration_ms: 1 });

    expect(registry.require(run.runId)).toMatchObject({
      currentNode: 'a',
      iterations: 1,
      state: { fresh: true },
      executionLog: [{ node: 'a', status: 'completed', details: { function: 'f', duration_ms: 1 } }],
    });
  });

  it('should keep log timestamps from going backwards', () => {
    const registry = new RunRegistry();
    const run = registry.start('g1', {});

    vi.spyOn(Date, 'now').mockReturnValueOnce(2_000_000).mockReturnValueOnce(1_000_000);
    run.appendLog('a', 'completed');
    run.appendLog('b', 'completed');

    const [first, second] = registry.require(run.runId).executionLog;
    expect(first.timestamp).toBe(new Date(2_000_000).toISOString());
    expect(second.timestamp).toBe(first.timestamp);
  });

  it('should refuse writes once a run is terminal', () => {
    const registry = new RunRegistry();
    const run = registry.start('g1', {});

    run.enterNode('a', 1);
    const record = run.complete();

    expect(record.status).toBe('completed');
    expect(record.currentNode).toBeNull();
    expect(record.endTime).not.toBeNull();
    expect(() => run.appendLog('a', 'completed')).toThrow(RunStateError);
    expect(() => run.replaceState({})).toThrow(RunStateError);
    expect(() => run.fail('late')).toThrow(`Run ${run.runId} is already completed`);
  });

  it('should capture the error of a failed run', () => {
    const registry = new RunRegistry();
    const run = registry.start('g1', {});

    run.enterNode('a', 1);
    const record = run.fail('boom');

    expect(record).toMatchObject({ status: 'failed', error: 'boom', currentNode: 'a' });
  });

  it('should raise for an unknown run', () => {
    const registry = new RunRegistry();

    expect(registry.get('missing')).toBeUndefined();
    expect(() => registry.require('missing')).toThrow(RunNotFoundError);
  });
});
