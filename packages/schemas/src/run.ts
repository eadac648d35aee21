import { z } from 'zod';

export const RunStatusSchema = z.enum(['pending', 'running', 'completed', 'failed', 'cancelled']);

export const RunModeSchema = z.enum(['sync', 'background', 'stream']);

export const LogEntryStatusSchema = z.enum(['completed', 'failed', 'terminated']);

export const LogEntrySchema = z.object({
  node: z.string(),
  status: LogEntryStatusSchema,
  timestamp: z.string().datetime(),
  details: z.record(z.unknown()),
});

export const RunRequestSchema = z.object({
  graph_id: z.string().min(1),
  initial_state: z.record(z.unknown()).default({}),
});

export const RunResponseSchema = z.object({
  run_id: z.string(),
  final_state: z.record(z.unknown()),
  execution_log: z.array(LogEntrySchema),
  status: RunStatusSchema,
});

export const BackgroundRunResponseSchema = z.object({
  run_id: z.string(),
  message: z.string(),
  status_endpoint: z.string(),
});

export const StateResponseSchema = z.object({
  run_id: z.string(),
  graph_id: z.string(),
  status: RunStatusSchema,
  current_node: z.string().nullable(),
  state: z.record(z.unknown()),
  execution_log: z.array(LogEntrySchema),
  start_time: z.string().datetime(),
  end_time: z.string().datetime().nullable(),
  error: z.string().nullable(),
});

export const TaskStatusSchema = z.enum(['running', 'completed', 'failed', 'cancelled']);

export const BackgroundStatusResponseSchema = z.object({
  run_id: z.string(),
  task_status: TaskStatusSchema,
  workflow_status: RunStatusSchema.optional(),
  current_node: z.string().nullable().optional(),
  error: z.string().optional(),
});

export type RunStatus = z.infer<typeof RunStatusSchema>;
export type RunMode = z.infer<typeof RunModeSchema>;
export type LogEntryStatus = z.infer<typeof LogEntryStatusSchema>;
export type LogEntry = z.infer<typeof LogEntrySchema>;
export type RunRequest = z.infer<typeof RunRequestSchema>;
export type RunResponse = z.infer<typeof RunResponseSchema>;
export type BackgroundRunResponse = z.infer<typeof BackgroundRunResponseSchema>;
export type StateResponse = z.infer<typeof StateResponseSchema>;
export type TaskStatus = z.infer<typeof TaskStatusSchema>;
export type BackgroundStatusResponse = z.infer<typeof BackgroundStatusResponseSchema>;

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminalStatus(status: RunStatus): boolean {
  return TERMINAL_RUN_STATUSES.includes(status);
}
