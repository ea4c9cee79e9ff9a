export type {
  TStageNumber,
  TNodeRole,
  TBindingValue,
  TBindingKind,
  TDeclaredInput,
  TPipelineNode,
  TWorkflowManifest,
  TStageBuckets,
  TRawBindingValue,
} from './types.js';
export { binding, toBindingValue, toBindingMap } from './bindings.js';
export {
  ManifestValidationError,
  RawBindingValueSchema,
  RawNodeSchema,
  RawManifestSchema,
  parseStageNumber,
  parseManifest,
  parseManifestJson,
  type TRawNode,
  type TRawManifest,
} from './schema.js';
