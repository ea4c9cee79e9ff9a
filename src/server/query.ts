import { z } from 'zod';
import { ComponentStageSchema } from '../store/schema.js';
import type { TComponentFilter } from '../store/types.js';

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

export const ComponentListQuerySchema = z.object({
  stage: z.preprocess((value) => (value === '' ? undefined : value), ComponentStageSchema.optional()),
  language: optionalText,
  output_type: optionalText,
  has_output: z.enum(['true', 'false']).optional(),
  input_type: optionalText,
  limit: z.coerce.number().int().positive().optional(),
  offset: z.coerce.number().int().min(0).default(0),
});

export type TComponentListQuery = z.infer<typeof ComponentListQuerySchema>;

export function toComponentFilter(query: TComponentListQuery): TComponentFilter {
  return {
    stage: query.stage,
    language: query.language,
    outputType: query.output_type,
    hasOutput: query.has_output === undefined ? undefined : query.has_output === 'true',
    inputType: query.input_type,
  };
}

export function paginate<T>(items: readonly T[], offset: number, limit?: number): T[] {
  return items.slice(offset, limit === undefined ? undefined : offset + limit);
}
