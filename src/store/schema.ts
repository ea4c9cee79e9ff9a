/**
 * Component record validation.
 *
 * Input and output types are the Python-side type names the component editor
 * offers. Outputs may additionally be `none`; inputs may be callables.
 */

import { z } from 'zod';
import { formatIssues } from '../utils/error-utils.js';
import { ComponentValidationError } from './errors.js';

export const COMPONENT_STAGES = ['stage1', 'stage2', 'stage3', 'stage4'] as const;

const SHARED_TYPES = [
  'string',
  'int',
  'float',
  'bool',
  'list',
  'dict',
  'any',
  'DataFrame',
  'Series',
  'tuple',
  'array',
  'object',
  'iterable',
  'datetime',
  'ndarray',
  'tensor',
] as const;

export const INPUT_TYPES = [...SHARED_TYPES, 'function', 'keras.model', 'callable'] as const;

export const OUTPUT_TYPES = [...SHARED_TYPES, 'none'] as const;

export const ComponentStageSchema = z.enum(COMPONENT_STAGES, {
  errorMap: () => ({ message: 'Invalid stage. Must be stage1, stage2, stage3, or stage4' }),
});

export const ComponentInputSchema = z.object({
  name: z.string().min(1, 'Input name is required'),
  type: z.enum(INPUT_TYPES, {
    errorMap: () => ({ message: `Invalid input type. Must be one of: ${INPUT_TYPES.join(', ')}` }),
  }),
  description: z.string().default(''),
  required: z.boolean().default(false),
  defaultValue: z.unknown().optional(),
});

export const ComponentOutputSchema = z.object({
  type: z.enum(OUTPUT_TYPES, {
    errorMap: () => ({ message: `Invalid output type. Must be one of: ${OUTPUT_TYPES.join(', ')}` }),
  }),
  description: z.string().default(''),
});

export const ComponentDataSchema = z.object({
  name: z.string().min(1, 'Name is required'),
  description: z.string().default(''),
  code: z.string().min(1, 'Code is required'),
  language: z.string().min(1, 'Language is required'),
  stage: ComponentStageSchema,
  tags: z.array(z.string()).default([]),
  inputs: z.array(ComponentInputSchema).min(1, 'Component must have at least one input'),
  output: ComponentOutputSchema.optional(),
  createdBy: z.string().optional(),
});

export const ComponentRecordSchema = ComponentDataSchema.extend({
  id: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
});

/**
 * Validate and normalize component data. Throws ComponentValidationError.
 */
export function validateComponentData(input: unknown): z.infer<typeof ComponentDataSchema> {
  const parsed = ComponentDataSchema.safeParse(input);
  if (!parsed.success) {
    throw new ComponentValidationError(formatIssues(parsed.error.issues));
  }
  return parsed.data;
}
