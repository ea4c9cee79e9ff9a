export type {
  ComponentStore,
  TComponentStage,
  TInputType,
  TOutputType,
  TComponentInput,
  TComponentOutput,
  TComponentDataInput,
  TComponentData,
  TComponentRecord,
  TComponentFilter,
  TStageStat,
} from './types.js';
export {
  COMPONENT_STAGES,
  INPUT_TYPES,
  OUTPUT_TYPES,
  ComponentStageSchema,
  ComponentInputSchema,
  ComponentOutputSchema,
  ComponentDataSchema,
  ComponentRecordSchema,
  validateComponentData,
} from './schema.js';
export {
  InMemoryComponentStore,
  matchesComponentFilter,
  hasUsableOutput,
  type TComponentStoreOptions,
} from './memory-store.js';
export { JsonFileComponentStore } from './json-file-store.js';
export { ComponentValidationError, ComponentNotFoundError } from './errors.js';
