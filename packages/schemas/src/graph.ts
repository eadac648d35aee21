import { z } from 'zod';

export const NodeConfigSchema = z.object({
  function: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

const TargetedConditionalEdgeSchema = z.object({
  condition: z.string().min(1),
  true_target: z.string().min(1),
  false_target: z.string().min(1),
});

// Shape accepted by earlier clients: { condition, true, false }
const BranchConditionalEdgeSchema = z
  .object({
    condition: z.string().min(1),
    true: z.string().min(1),
    false: z.string().min(1),
  })
  .transform((edge) => ({
    condition: edge.condition,
    true_target: edge.true,
    false_target: edge.false,
  }));

export const ConditionalEdgeSchema = z.union([
  TargetedConditionalEdgeSchema,
  BranchConditionalEdgeSchema,
]);

export const GraphDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  start_node: z.string().min(1).optional(),
  nodes: z.record(NodeConfigSchema),
  edges: z.record(z.string().min(1)).default({}),
  conditional_edges: z.record(ConditionalEdgeSchema).default({}),
});

export const GraphCreateResponseSchema = z.object({
  graph_id: z.string(),
  message: z.string(),
});

export const GraphSummarySchema = z.object({
  graph_id: z.string(),
  name: z.string(),
  node_count: z.number().int(),
  created_at: z.string().datetime(),
});

export type NodeConfig = z.infer<typeof NodeConfigSchema>;
export type ConditionalEdge = z.infer<typeof ConditionalEdgeSchema>;
export type GraphDefinition = z.infer<typeof GraphDefinitionSchema>;
export type GraphDefinitionInput = z.input<typeof GraphDefinitionSchema>;
export type GraphCreateResponse = z.infer<typeof GraphCreateResponseSchema>;
export type GraphSummary = z.infer<typeof GraphSummarySchema>;
