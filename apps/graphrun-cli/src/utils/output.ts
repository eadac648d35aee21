import chalk from 'chalk';
import Table from 'cli-table3';
import type { LogEntry, StreamMessage } from '@graphrun/schemas';
import { getConfigManager } from '../config/index.js';

export type OutputFormat = 'json' | 'table';

export function output(data: unknown, format?: OutputFormat): void {
  const outputFormat = format || getConfigManager().get().defaultFormat;

  if (outputFormat === 'json') {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(data);
  }
}

export function outputTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map(h => chalk.cyan(h)),
    style: {
      head: [],
      border: ['grey'],
    },
  });

  rows.forEach(row => table.push(row));
  console.log(table.toString());
}

export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function warning(message: string): void {
  console.warn(chalk.yellow('⚠'), message);
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function formatStatus(status: string): string {
  switch (status) {
    case 'completed':
    case 'connected':
      return chalk.green(status);
    case 'failed':
    case 'error':
      return chalk.red(status);
    case 'running':
      return chalk.blue(status);
    case 'pending':
    case 'terminated':
      return chalk.yellow(status);
    case 'cancelled':
    case 'cancelling':
      return chalk.gray(status);
    default:
      return status;
  }
}

export function formatDate(date: string | Date): string {
  const d = typeof date === 'string' ? new Date(date) : date;
  return d.toLocaleString();
}

export function truncate(str: string, length: number = 50): string {
  if (str.length <= length) return str;
  return str.slice(0, length - 3) + '...';
}

/** Rows for an execution log table: node, status, time, details. */
export function logRows(log: LogEntry[]): string[][] {
  return log.map((entry) => [
    entry.node,
    formatStatus(entry.status),
    formatDate(entry.timestamp),
    truncate(JSON.stringify(entry.details), 60),
  ]);
}

/** One line describing a streamed run event. */
export function formatStreamMessage(message: StreamMessage): string {
  switch (message.type) {
    case 'connected':
      return `${formatStatus('connected')} ${message.message}`;
    case 'status':
      return `run ${message.run_id} is ${formatStatus(message.status)}`;
    case 'node_start':
      return `${chalk.bold(message.node)} started (iteration ${message.iteration})`;
    case 'node_complete':
      return `${chalk.bold(message.node)} completed ${message.function} in ${message.duration_ms}ms`;
    case 'transition':
      return `${message.from} -> ${message.to}`;
    case 'system':
      return `${formatStatus('terminated')} ${message.reason}`;
    case 'node_error':
      return `${chalk.bold(message.node)} ${formatStatus('failed')}: ${message.error}`;
    case 'error':
      return `${formatStatus('error')} ${message.message}: ${message.error}`;
    case 'complete':
      return `run ${message.run_id} ${formatStatus(message.status)} after ${message.execution_log.length} log entries`;
  }
}
