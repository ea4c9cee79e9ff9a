import type { z } from 'zod';
import type {
  COMPONENT_STAGES,
  ComponentDataSchema,
  ComponentInputSchema,
  ComponentOutputSchema,
  ComponentRecordSchema,
  INPUT_TYPES,
  OUTPUT_TYPES,
} from './schema.js';

export type TComponentStage = (typeof COMPONENT_STAGES)[number];
export type TInputType = (typeof INPUT_TYPES)[number];
export type TOutputType = (typeof OUTPUT_TYPES)[number];

export type TComponentInput = z.infer<typeof ComponentInputSchema>;
export type TComponentOutput = z.infer<typeof ComponentOutputSchema>;

/** Component fields a caller supplies; defaults not yet applied */
export type TComponentDataInput = z.input<typeof ComponentDataSchema>;
export type TComponentData = z.infer<typeof ComponentDataSchema>;
export type TComponentRecord = z.infer<typeof ComponentRecordSchema>;

export type TComponentFilter = {
  stage?: TComponentStage;
  language?: string;
  outputType?: string;
  /** true: output present and not `none`; false: the opposite */
  hasOutput?: boolean;
  /** Matches when any input has this type */
  inputType?: string;
  /** Case-insensitive substring of the name */
  nameContains?: string;
};

export type TStageStat = {
  stage: TComponentStage;
  count: number;
};

/**
 * Persistence for reusable pipeline components.
 *
 * Implementations validate on create and update and throw
 * ComponentValidationError for bad data. Lookups of unknown ids resolve to
 * null/false rather than throwing.
 */
export interface ComponentStore {
  create(input: TComponentDataInput): Promise<TComponentRecord>;
  findById(id: string): Promise<TComponentRecord | null>;
  update(id: string, input: TComponentDataInput): Promise<TComponentRecord | null>;
  delete(id: string): Promise<boolean>;
  /** Newest first */
  find(filter?: TComponentFilter): Promise<TComponentRecord[]>;
  findByStage(stage: TComponentStage): Promise<TComponentRecord[]>;
  /** Stages that have components, in stage order */
  stageStats(): Promise<TStageStat[]>;
}
