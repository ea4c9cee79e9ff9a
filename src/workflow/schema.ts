import { z } from 'zod';
import { NODE_ROLES } from '../constants.js';
import { RawBindingValueSchema } from '../manifest/schema.js';

export const WorkflowItemSchema = z.object({
  type: z.enum(['id', 'code']),
  value: z.string().min(1, 'Item value is required'),
});

export const WorkflowItemsSchema = z.array(WorkflowItemSchema).min(1, 'At least one workflow item is required');

export const ComponentEntrySchema = z.object({
  componentId: z.string().min(1, 'componentId is required'),
  /** Overrides the component name as the node's display label */
  name: z.string().optional(),
  role: z.enum(NODE_ROLES).optional(),
  variables: z.record(RawBindingValueSchema).default({}),
});

export type TWorkflowItem = z.infer<typeof WorkflowItemSchema>;
export type TComponentEntry = z.input<typeof ComponentEntrySchema>;
