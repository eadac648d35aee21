import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatStatus, formatStreamMessage, logRows, truncate } from './output.js';

const timestamp = '2026-01-02T03:04:05.000Z';

describe('output helpers', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should truncate long strings', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('abcdefghijkl', 8)).toBe('abcde...');
  });

  it('should leave unknown statuses alone', () => {
    expect(formatStatus('weird')).toBe('weird');
    expect(formatStatus('cancelled')).toBe('cancelled');
  });

  it('should describe stream messages', () => {
    expect(formatStreamMessage({ type: 'transition', from: 'a', to: 'END', timestamp })).toBe('a -> END');
    expect(formatStreamMessage({ type: 'node_start', node: 'a', iteration: 2, timestamp })).toBe(
      'a started (iteration 2)'
    );
    expect(
      formatStreamMessage({
        type: 'node_complete',
        node: 'a',
        function: 'identity',
        duration_ms: 1.5,
        state: {},
        timestamp,
      })
    ).toBe('a completed identity in 1.5ms');
    expect(formatStreamMessage({ type: 'system', reason: 'max iterations reached', timestamp })).toBe(
      'terminated max iterations reached'
    );
    expect(
      formatStreamMessage({
        type: 'error',
        error: 'boom',
        message: 'Workflow execution failed',
        timestamp,
      })
    ).toBe('error Workflow execution failed: boom');
  });

  it('should build log table rows', () => {
    const rows = logRows([
      { node: 'a', status: 'completed', timestamp, details: { function: 'identity' } },
    ]);

    expect(rows).toHaveLength(1);
    expect(rows[0][0]).toBe('a');
    expect(rows[0][1]).toBe('completed');
    expect(rows[0][3]).toBe('{"function":"identity"}');
  });
});
