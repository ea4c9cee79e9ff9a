/**
 * Tests for per-node invocation synthesis
 */

import { planInvocation, synthesizeInvocation } from '../../src/generator/invocation.js';
import { binding, createNode } from '../helpers/pipeline-fixtures.js';

describe('planInvocation', () => {
  it('should resolve a transform with sorted keyword arguments', () => {
    const node = createNode({
      displayName: 'Scale Features',
      variableBindings: { with_std: binding.bool(true), method: binding.string('standard') },
    });
    expect(planInvocation(node, 1)).toEqual({
      callableName: 'scale_features',
      label: 'Scale Features',
      shape: 'transform',
      keywordArguments: "method='standard', with_std=True",
    });
  });

  it('should drop target_column from split calls only', () => {
    const variableBindings = { target_column: binding.string('label'), test_size: binding.number(0.2) };
    const split = planInvocation(createNode({ displayName: 'Train Test Split', variableBindings }), 1);
    expect(split.shape).toBe('split');
    expect(split.keywordArguments).toBe('test_size=0.200000');

    const transform = planInvocation(createNode({ displayName: 'Encode Columns', variableBindings }), 2);
    expect(transform.shape).toBe('transform');
    expect(transform.keywordArguments).toBe("target_column='label', test_size=0.200000");
  });

  it('should fall back to the callable name as label', () => {
    const plan = planInvocation(createNode({ displayName: '', codeIdentifier: 'impute_missing' }), 1);
    expect(plan.label).toBe('impute_missing');
  });

  it('should classify row filters by name', () => {
    for (const name of ['Remove Outliers', 'Drop Duplicates', 'Filter Rows', 'Clip Outlier Values']) {
      expect(planInvocation(createNode({ displayName: name }), 1).shape).toBe('row-filter');
    }
  });

  it('should check split names before row-filter names', () => {
    expect(planInvocation(createNode({ displayName: 'Drop And Split' }), 1).shape).toBe('split');
    expect(planInvocation(createNode({ displayName: 'Stratified Sample' }), 2).shape).toBe('split');
  });

  it('should use an explicit role that fits the stage', () => {
    const node = createNode({ codeIdentifier: 'dedupe', role: 'row-filter' });
    expect(planInvocation(node, 2).shape).toBe('row-filter');
  });

  it('should ignore a role that does not fit the stage', () => {
    const node = createNode({ displayName: 'Scale Features', role: 'fit' });
    expect(planInvocation(node, 1).shape).toBe('transform');
  });

  it('should let an explicit role override a misleading name', () => {
    const node = createNode({ displayName: 'Split Name Column', role: 'transform' });
    expect(planInvocation(node, 1).shape).toBe('transform');
  });

  it('should fit in stage 3 and pick metrics or cross-validation in stage 4', () => {
    expect(planInvocation(createNode({ displayName: 'Random Forest' }), 3).shape).toBe('fit');
    expect(planInvocation(createNode({ displayName: 'Cross Validate' }), 4).shape).toBe('cross-validation');
    expect(planInvocation(createNode({ codeIdentifier: 'run_kfold' }), 4).shape).toBe('cross-validation');
    expect(planInvocation(createNode({ displayName: 'Classification Report' }), 4).shape).toBe('metrics');
  });
});

describe('synthesizeInvocation', () => {
  it('should emit a guarded transform call with tuple unwrapping', () => {
    const node = createNode({ displayName: 'Scale Features', variableBindings: { factor: binding.number(2) } });
    const lines = synthesizeInvocation(node, 1, 2, 1).split('\n');

    expect(lines).toEqual([
      '    print(f"  [1/2] Executing: Scale Features")',
      '    try:',
      '        result = scale_features(current_data, factor=2)',
      '        if isinstance(result, tuple):',
      '            current_data = result[0]',
      '        else:',
      '            current_data = result',
      '        print(f"    ✓ Completed")',
      '    except Exception as e:',
      '        print(f"    ⚠ Error in Scale Features: {e}")',
      '        print(f"    Skipping component...")',
      '',
    ]);
  });

  it('should resynchronize labels after a row filter until a split happens', () => {
    const text = synthesizeInvocation(createNode({ displayName: 'Remove Outliers' }), 1, 1, 1);
    expect(text).toContain('        result = remove_outliers(current_data)\n');
    expect(text).toContain('        if y is not None and not split_performed:\n');
    expect(text).toContain('                y = y.loc[current_data.index]\n');
  });

  it('should not resynchronize labels after a plain transform', () => {
    const text = synthesizeInvocation(createNode({ displayName: 'Scale Features' }), 1, 1, 1);
    expect(text).not.toContain('y.loc[');
  });

  it('should pass the frame and label column positionally to a split', () => {
    const node = createNode({
      displayName: 'Train Test Split',
      variableBindings: { test_size: binding.number(0.2), random_state: binding.number(42) },
    });
    const text = synthesizeInvocation(node, 2, 3, 1);

    expect(text).toContain('    print(f"  [2/3] Executing: Train Test Split")\n');
    expect(text).toContain('        if y is not None:\n');
    expect(text).toContain(
      '            X_train, X_test, y_train, y_test = train_test_split(df, target_column, random_state=42, test_size=0.200000)\n'
    );
    expect(text).toContain('            split_performed = True\n');
  });

  it('should train on encoded labels in stage 3', () => {
    const node = createNode({
      displayName: 'Train Random Forest',
      variableBindings: { n_estimators: binding.number(100) },
    });
    const text = synthesizeInvocation(node, 1, 1, 3);

    expect(text).toContain('    print(f"  [1/1] Training: Train Random Forest")\n');
    expect(text).toContain('                le = LabelEncoder()\n');
    expect(text).toContain('            model = train_random_forest(X_for_training, y_encoded, n_estimators=100)\n');
    expect(text).toContain('            model = None\n');
  });

  it('should call cross-validation with the model first', () => {
    const text = synthesizeInvocation(createNode({ displayName: 'Cross Validate' }), 1, 2, 4);
    expect(text).toContain('    print(f"  [1/2] Evaluating: Cross Validate")\n');
    expect(text).toContain('            cv_results = cross_validate(model, X_for_cv, y_encoded)\n');
  });

  it('should call metrics with labels, predictions and probabilities', () => {
    const node = createNode({ displayName: 'Classification Report', variableBindings: { average: binding.string('macro') } });
    const text = synthesizeInvocation(node, 2, 2, 4);
    expect(text).toContain("            metrics = classification_report(y_encoded, y_pred, y_pred_proba, average='macro')\n");
    expect(text).toContain('            y_pred = model.predict(X_eval)\n');
  });

  it('should escape the label inside progress lines', () => {
    const node = createNode({ displayName: 'Scale {raw} "v2"', codeIdentifier: 'scale' });
    const text = synthesizeInvocation(node, 1, 1, 1);
    expect(text.split('\n')[0]).toBe('    print(f"  [1/1] Executing: Scale {{raw}} \\"v2\\"")');
  });

  it('should keep carriage returns in the label out of the emitted lines', () => {
    const node = createNode({ displayName: 'Scale\rFeatures', codeIdentifier: 'scale_features' });
    const text = synthesizeInvocation(node, 1, 1, 1);

    expect(text).not.toContain('\r');
    expect(text.split('\n')[0]).toBe('    print(f"  [1/1] Executing: Scale Features")');
    expect(text).toContain('        print(f"    ⚠ Error in Scale Features: {e}")\n');
  });

  it('should end with a blank separator line', () => {
    expect(synthesizeInvocation(createNode(), 1, 1, 2).endsWith('\n')).toBe(true);
  });
});
