import { z } from 'zod';
import { LogEntrySchema, RunStatusSchema } from './run';

const timestamp = z.string().datetime();

export const ConnectedMessageSchema = z.object({
  type: z.literal('connected'),
  graph_id: z.string(),
  message: z.string(),
  timestamp,
});

export const StatusMessageSchema = z.object({
  type: z.literal('status'),
  run_id: z.string(),
  graph_id: z.string(),
  status: RunStatusSchema,
  timestamp,
});

export const NodeStartMessageSchema = z.object({
  type: z.literal('node_start'),
  node: z.string(),
  iteration: z.number().int().positive(),
  timestamp,
});

export const NodeCompleteMessageSchema = z.object({
  type: z.literal('node_complete'),
  node: z.string(),
  function: z.string(),
  duration_ms: z.number(),
  state: z.record(z.unknown()),
  timestamp,
});

export const TransitionMessageSchema = z.object({
  type: z.literal('transition'),
  from: z.string(),
  to: z.string(),
  timestamp,
});

export const SystemMessageSchema = z.object({
  type: z.literal('system'),
  reason: z.string(),
  timestamp,
});

export const NodeErrorMessageSchema = z.object({
  type: z.literal('node_error'),
  node: z.string(),
  error: z.string(),
  timestamp,
});

export const ErrorMessageSchema = z.object({
  type: z.literal('error'),
  run_id: z.string().optional(),
  error: z.string(),
  message: z.string(),
  timestamp,
});

export const CompleteMessageSchema = z.object({
  type: z.literal('complete'),
  run_id: z.string(),
  status: RunStatusSchema,
  final_state: z.record(z.unknown()),
  execution_log: z.array(LogEntrySchema),
  timestamp,
});

export const StreamMessageSchema = z.discriminatedUnion('type', [
  ConnectedMessageSchema,
  StatusMessageSchema,
  NodeStartMessageSchema,
  NodeCompleteMessageSchema,
  TransitionMessageSchema,
  SystemMessageSchema,
  NodeErrorMessageSchema,
  ErrorMessageSchema,
  CompleteMessageSchema,
]);

export const StreamRequestSchema = z.object({
  initial_state: z.record(z.unknown()).default({}),
});

export type StreamMessage = z.infer<typeof StreamMessageSchema>;
export type StreamMessageType = StreamMessage['type'];

/** Messages produced by a traversal; `connected` belongs to the transport. */
export type RunEvent = Exclude<StreamMessage, { type: 'connected' }>;
export type StreamRequest = z.infer<typeof StreamRequestSchema>;
