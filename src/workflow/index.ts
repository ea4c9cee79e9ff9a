export {
  resolveWorkflowItems,
  buildManifestFromComponents,
  componentStageNumber,
  CODE_BLOCK_SEPARATOR,
  COMPONENT_MANIFEST_VERSION,
  type TResolvedItem,
  type TResolvedWorkflow,
  type TComponentWorkflow,
} from './resolver.js';
export {
  WorkflowItemSchema,
  WorkflowItemsSchema,
  ComponentEntrySchema,
  type TWorkflowItem,
  type TComponentEntry,
} from './schema.js';
