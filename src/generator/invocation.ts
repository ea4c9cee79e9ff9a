/**
 * Invocation Synthesizer
 *
 * Emits the Python statements that call one node inside `execute_pipeline`.
 * The call shape depends on the stage and the node's resolved role:
 *
 * | Stage | Role              | Call                                                        |
 * |-------|-------------------|-------------------------------------------------------------|
 * | 1, 2  | transform         | `result = fn(current_data, ...)`                            |
 * | 1, 2  | row-filter        | as transform, then labels re-indexed to surviving rows      |
 * | 1, 2  | split             | `X_train, X_test, y_train, y_test = fn(df, target_column, ...)` |
 * | 3     | fit               | `model = fn(X, y_encoded, ...)`                             |
 * | 4     | metrics           | `metrics = fn(y_encoded, y_pred, y_pred_proba, ...)`        |
 * | 4     | cross-validation  | `cv_results = fn(model, X, y_encoded, ...)`                 |
 *
 * Every call is wrapped so a failing component only skips itself; the
 * pipeline carries on with the state it had before the call.
 *
 * @module generator/invocation
 */

import { LABEL_COLUMN_BINDING } from '../constants.js';
import type { TNodeRole, TPipelineNode, TStageNumber } from '../manifest/types.js';
import { indentLines, resolveCallableName, toFStringText } from './code-utils.js';
import { serializeBindings } from './literals.js';
import { resolveCallShape } from './roles.js';

/** Indent of statements inside the body of `execute_pipeline` */
export const PIPELINE_BODY_INDENT = '    ';

export type TInvocationPlan = {
  callableName: string;
  /** Label printed in progress lines */
  label: string;
  shape: TNodeRole;
  /** Keyword arguments as they appear in the call */
  keywordArguments: string;
};

/**
 * Resolve everything about a node's call that does not depend on its position.
 */
export function planInvocation(node: TPipelineNode, stage: TStageNumber): TInvocationPlan {
  const callableName = resolveCallableName(node);
  const shape = resolveCallShape(node, callableName, stage);
  const keywordArguments = serializeBindings(node.variableBindings, {
    exclude: shape === 'split' ? [LABEL_COLUMN_BINDING] : [],
    nodeId: node.identifier,
  });
  const label = node.displayName.trim() || callableName;
  return { callableName, label, shape, keywordArguments };
}

function callExpression(callableName: string, positional: string[], keywordArguments: string): string {
  const args = keywordArguments === '' ? positional : [...positional, keywordArguments];
  return `${callableName}(${args.join(', ')})`;
}

function progressLine(verb: string, index: number, total: number, label: string): string {
  return `print(f"  [${index}/${total}] ${verb}: ${toFStringText(label)}")`;
}

function asArrayExpression(variable: string): string {
  return `${variable}.values if isinstance(${variable}, pd.DataFrame) else ${variable}`;
}

/**
 * Label encoding for an evaluation-time label vector. Reuses the encoder
 * fitted during training when there is one.
 */
function reuseOrFitEncoderLines(labels: string): string[] {
  return [
    `if hasattr(${labels}, 'dtype') and ${labels}.dtype == 'object':`,
    `    if le is None:`,
    `        from sklearn.preprocessing import LabelEncoder`,
    `        le = LabelEncoder()`,
    `        y_encoded = le.fit_transform(${labels})`,
    `    else:`,
    `        y_encoded = le.transform(${labels})`,
    `else:`,
    `    y_encoded = ${labels}.values if hasattr(${labels}, 'values') else ${labels}`,
  ];
}

// ---------------------------------------------------------------------------
// Stages 1 & 2
// ---------------------------------------------------------------------------

function splitLines(plan: TInvocationPlan): string[] {
  const call = callExpression(plan.callableName, ['df', 'target_column'], plan.keywordArguments);
  return [
    `if y is not None:`,
    `    X_train, X_test, y_train, y_test = ${call}`,
    `    current_data = X_train`,
    `    split_performed = True`,
    `    print(f"    ✓ Split into train ({len(X_train)}) and test ({len(X_test)}) sets")`,
    `else:`,
    `    print(f"    ⚠ No target column, skipping train/test split")`,
  ];
}

function transformLines(plan: TInvocationPlan): string[] {
  const lines = [
    `result = ${callExpression(plan.callableName, ['current_data'], plan.keywordArguments)}`,
    `if isinstance(result, tuple):`,
    `    current_data = result[0]`,
    `else:`,
    `    current_data = result`,
  ];

  if (plan.shape === 'row-filter') {
    lines.push(
      ``,
      `# Synchronize target variable if rows were removed`,
      `if y is not None and not split_performed:`,
      `    if isinstance(current_data, pd.DataFrame) and len(current_data) != len(y):`,
      `        y = y.loc[current_data.index]`,
      `        print(f"    ⚠ Synced target variable: {len(y)} samples remaining")`
    );
  }

  return lines;
}

function transformStageLines(plan: TInvocationPlan, index: number, total: number): string[] {
  const body = plan.shape === 'split' ? splitLines(plan) : transformLines(plan);
  return [
    progressLine('Executing', index, total, plan.label),
    `try:`,
    ...indentLines(body, '    '),
    `    print(f"    ✓ Completed")`,
    `except Exception as e:`,
    `    print(f"    ⚠ Error in ${toFStringText(plan.label)}: {e}")`,
    `    print(f"    Skipping component...")`,
  ];
}

// ---------------------------------------------------------------------------
// Stage 3
// ---------------------------------------------------------------------------

function fitStageLines(plan: TInvocationPlan, index: number, total: number): string[] {
  const call = callExpression(plan.callableName, ['X_for_training', 'y_encoded'], plan.keywordArguments);
  return [
    progressLine('Training', index, total, plan.label),
    `if y is not None or y_train is not None:`,
    `    try:`,
    `        if split_performed and X_train is not None:`,
    `            X_for_training = ${asArrayExpression('X_train')}`,
    `            y_for_training = y_train`,
    `            print(f"    ℹ Using training split: {len(X_for_training)} samples")`,
    `        else:`,
    `            X_for_training = ${asArrayExpression('current_data')}`,
    `            y_for_training = y`,
    `            print(f"    ℹ Using all data: {len(X_for_training)} samples")`,
    ``,
    `        # Encode labels if needed`,
    `        if hasattr(y_for_training, 'dtype') and y_for_training.dtype == 'object':`,
    `            from sklearn.preprocessing import LabelEncoder`,
    `            le = LabelEncoder()`,
    `            y_encoded = le.fit_transform(y_for_training)`,
    `            print(f"    ✓ Encoded {len(le.classes_)} classes: {list(le.classes_)}")`,
    `        else:`,
    `            y_encoded = y_for_training.values if hasattr(y_for_training, 'values') else y_for_training`,
    ``,
    `        model = ${call}`,
    `        print(f"    ✓ Model trained successfully")`,
    `    except Exception as e:`,
    `        print(f"    ⚠ Training failed in ${toFStringText(plan.label)}: {e}")`,
    `        traceback.print_exc()`,
    `        model = None`,
    `else:`,
    `    print(f"    ⚠ No target column, skipping training")`,
    `    model = None`,
  ];
}

// ---------------------------------------------------------------------------
// Stage 4
// ---------------------------------------------------------------------------

function crossValidationStageLines(plan: TInvocationPlan, index: number, total: number): string[] {
  const call = callExpression(plan.callableName, ['model', 'X_for_cv', 'y_encoded'], plan.keywordArguments);
  return [
    progressLine('Evaluating', index, total, plan.label),
    `if model is not None and (y is not None or y_train is not None):`,
    `    try:`,
    `        if split_performed and X_train is not None:`,
    `            X_for_cv = ${asArrayExpression('X_train')}`,
    `            y_for_cv = y_train`,
    `        else:`,
    `            X_for_cv = ${asArrayExpression('current_data')}`,
    `            y_for_cv = y`,
    ``,
    ...indentLines(reuseOrFitEncoderLines('y_for_cv'), '        '),
    ``,
    `        cv_results = ${call}`,
    ``,
    `        if isinstance(cv_results, dict):`,
    `            print(f"\\n    Cross-Validation Results:")`,
    `            if 'mean_test_score' in cv_results:`,
    `                print(f"      Mean Test Score: {cv_results['mean_test_score']:.4f} (+/- {cv_results.get('std_test_score', 0):.4f})")`,
    `            if 'mean_train_score' in cv_results:`,
    `                print(f"      Mean Train Score: {cv_results['mean_train_score']:.4f} (+/- {cv_results.get('std_train_score', 0):.4f})")`,
    `            if 'test_scores' in cv_results:`,
    `                print(f"      Individual Fold Scores: {[f'{score:.4f}' for score in cv_results['test_scores']]}")`,
    ``,
    `        print(f"    ✓ Cross-validation completed")`,
    `    except Exception as e:`,
    `        print(f"    ⚠ Cross-validation failed in ${toFStringText(plan.label)}: {e}")`,
    `        traceback.print_exc()`,
    `else:`,
    `    print(f"    ⚠ No model or target, skipping cross-validation")`,
  ];
}

function metricsStageLines(plan: TInvocationPlan, index: number, total: number): string[] {
  const call = callExpression(plan.callableName, ['y_encoded', 'y_pred', 'y_pred_proba'], plan.keywordArguments);
  return [
    progressLine('Evaluating', index, total, plan.label),
    `if model is not None and (y is not None or y_train is not None):`,
    `    try:`,
    `        if split_performed and X_test is not None and y_test is not None:`,
    `            X_eval = ${asArrayExpression('X_test')}`,
    `            y_for_eval = y_test`,
    `            eval_type = "test"`,
    `            print(f"    ℹ Evaluating on test set: {len(X_eval)} samples")`,
    `        elif split_performed and X_train is not None:`,
    `            X_eval = ${asArrayExpression('X_train')}`,
    `            y_for_eval = y_train`,
    `            eval_type = "training"`,
    `            print(f"    ⚠ Evaluating on training set: {len(X_eval)} samples")`,
    `        else:`,
    `            X_eval = ${asArrayExpression('current_data')}`,
    `            y_for_eval = y`,
    `            eval_type = "all data"`,
    `            print(f"    ⚠ Evaluating on all data: {len(X_eval)} samples")`,
    ``,
    ...indentLines(reuseOrFitEncoderLines('y_for_eval'), '        '),
    ``,
    `        y_pred = model.predict(X_eval)`,
    ``,
    `        try:`,
    `            y_pred_proba = model.predict_proba(X_eval)`,
    `        except Exception:`,
    `            y_pred_proba = None`,
    ``,
    `        metrics = ${call}`,
    ``,
    `        if isinstance(metrics, dict):`,
    `            print(f"\\n    Metrics ({eval_type} set):")`,
    `            for key, value in metrics.items():`,
    `                if isinstance(value, (int, float)):`,
    `                    print(f"      {key}: {value:.4f}")`,
    `                elif key == 'confusion_matrix':`,
    `                    print(f"      {key}:")`,
    `                    for row in value:`,
    `                        print(f"        {row}")`,
    ``,
    `        print(f"    ✓ Evaluation completed")`,
    `    except Exception as e:`,
    `        print(f"    ⚠ Evaluation failed in ${toFStringText(plan.label)}: {e}")`,
    `        traceback.print_exc()`,
    `else:`,
    `    print(f"    ⚠ No model or target, skipping evaluation")`,
  ];
}

function stageLines(plan: TInvocationPlan, index: number, total: number): string[] {
  switch (plan.shape) {
    case 'fit':
      return fitStageLines(plan, index, total);
    case 'cross-validation':
      return crossValidationStageLines(plan, index, total);
    case 'metrics':
      return metricsStageLines(plan, index, total);
    case 'transform':
    case 'row-filter':
    case 'split':
      return transformStageLines(plan, index, total);
  }
}

/**
 * Statement lines for one node, indented for the body of `execute_pipeline`
 * and followed by a blank separator line.
 */
export function buildInvocationLines(
  node: TPipelineNode,
  indexInStage: number,
  countInStage: number,
  stageNumber: TStageNumber
): string[] {
  const plan = planInvocation(node, stageNumber);
  return [...indentLines(stageLines(plan, indexInStage, countInStage), PIPELINE_BODY_INDENT), ''];
}

/**
 * Synthesize the text block that invokes a node.
 *
 * @param indexInStage - 1-based position of the node within its stage bucket
 * @param countInStage - Number of nodes in the bucket
 */
export function synthesizeInvocation(
  node: TPipelineNode,
  indexInStage: number,
  countInStage: number,
  stageNumber: TStageNumber
): string {
  return buildInvocationLines(node, indexInStage, countInStage, stageNumber).join('\n');
}
