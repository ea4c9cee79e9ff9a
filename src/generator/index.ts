export { assembleScript, validateManifestForGeneration, type TAssembleOptions } from './assembler.js';
export { partitionByStage, effectiveStage } from './partition.js';
export {
  synthesizeInvocation,
  buildInvocationLines,
  planInvocation,
  PIPELINE_BODY_INDENT,
  type TInvocationPlan,
} from './invocation.js';
export {
  serializeBindings,
  formatBindingLiteral,
  formatNumberLiteral,
  formatStringLiteral,
  formatSequenceLiteral,
  isDecimalNumberText,
  type TSerializeBindingsOptions,
} from './literals.js';
export {
  resolveCallShape,
  matchesSplitName,
  matchesCrossValidationName,
  matchesRowFilterName,
} from './roles.js';
export {
  resolveCallableName,
  slugifyDisplayName,
  isValidPythonIdentifier,
  toPythonStringLiteral,
} from './code-utils.js';
export { findDefinedCallables, checkCallableCoverage, type TCallableCoverage } from './coverage.js';
export { ScriptGenerationError, type TScriptGenerationErrorCode } from './errors.js';
