/**
 * # Pipeline Constants
 *
 * Stage numbers, call-shape name patterns and the fixed command-line contract
 * of generated scripts.
 *
 * ## Stages
 *
 * ```
 * ┌───────┬──────────────────────┬──────────────────────────────────────────┐
 * │ Stage │ Name                 │ Call shape                               │
 * ├───────┼──────────────────────┼──────────────────────────────────────────┤
 * │ 1     │ Preprocessing        │ transform / row-filter / split           │
 * │ 2     │ Feature engineering  │ transform / row-filter / split           │
 * │ 3     │ Model training       │ fit                                      │
 * │ 4     │ Evaluation           │ metrics / cross-validation               │
 * └───────┴──────────────────────┴──────────────────────────────────────────┘
 * ```
 *
 * ## Name patterns
 *
 * Nodes without an explicit `role` get their call shape from substring
 * matches on the lowercased callable name. The keyword lists are not
 * exhaustive; callers who need a specific shape should set `role`.
 */

export const STAGE_NUMBERS = [1, 2, 3, 4] as const;

export const DEFAULT_STAGE = 1 as const;

export const STAGE_TITLES = {
  1: 'PREPROCESSING',
  2: 'FEATURE ENGINEERING',
  3: 'MODEL TRAINING',
  4: 'EVALUATION',
} as const;

export const NODE_ROLES = [
  'transform',
  'row-filter',
  'split',
  'fit',
  'cross-validation',
  'metrics',
] as const;

export const SPLIT_NAME_KEYWORDS = ['split', 'stratified'] as const;

export const CROSS_VALIDATION_NAME_KEYWORDS = ['cross', 'kfold', 'k_fold', '_cv', 'crossval'] as const;

export const ROW_FILTER_NAME_KEYWORDS = ['outlier', 'remove', 'drop', 'filter'] as const;

/** Binding passed positionally to split callables, so dropped from their keyword list */
export const LABEL_COLUMN_BINDING = 'target_column';

/** Python keyword spellings emitted unquoted when they arrive as strings */
export const PYTHON_KEYWORD_LITERALS = ['None', 'True', 'False'] as const;

// Generated script command line. Downstream tooling depends on these exactly.
export const SCRIPT_CLI = {
  DATA_FLAG: '--data',
  TARGET_FLAG: '--target',
  OUTPUT_FLAG: '--output',
  SKIP_SPLIT_WARNING_FLAG: '--skip-split-warning',
  DEFAULT_TARGET: 'target',
  DEFAULT_OUTPUT: 'output.csv',
} as const;

/** Exit codes of generated scripts. 2 is left to argparse usage errors. */
export const SCRIPT_EXIT_CODES = {
  GENERIC_FAILURE: 1,
  FILE_NOT_FOUND: 3,
  MISSING_COLUMN: 4,
} as const;

export const SECTION_RULE = '='.repeat(60);
