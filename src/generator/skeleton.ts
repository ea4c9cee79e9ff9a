/**
 * Fixed sections of the generated script. Everything here is independent of
 * the nodes except the header values and the component bodies.
 */

import { SCRIPT_CLI, SCRIPT_EXIT_CODES, SECTION_RULE, STAGE_TITLES } from '../constants.js';
import type { TStageNumber } from '../manifest/types.js';
import { indentLines, toDocstringText } from './code-utils.js';
import { PIPELINE_BODY_INDENT } from './invocation.js';

export type THeaderValues = {
  generatedAt: string;
  formatVersion: string;
  exportedAt?: string;
  componentCount: number;
};

function banner(title: string): string[] {
  return [`# ${SECTION_RULE}`, `# ${title}`, `# ${SECTION_RULE}`];
}

export function headerLines(values: THeaderValues): string[] {
  return [
    '#!/usr/bin/env python3',
    '"""',
    'Auto-generated Pipeline Script',
    `Generated at: ${values.generatedAt}`,
    `Version: ${toDocstringText(values.formatVersion)}`,
    ...(values.exportedAt !== undefined ? [`Exported at: ${toDocstringText(values.exportedAt)}`] : []),
    `Total Components: ${values.componentCount}`,
    '"""',
    '',
    'import argparse',
    'import os',
    'import sys',
    'import traceback',
    'import warnings',
    '',
    'import numpy as np',
    'import pandas as pd',
    '',
    "warnings.filterwarnings('ignore', category=FutureWarning)",
    '',
    ...banner('COMPONENT FUNCTIONS'),
    '',
  ];
}

export function pipelineStartLines(): string[] {
  const body = [
    '"""Execute the complete pipeline"""',
    '',
    'print("=" * 60)',
    'print("PIPELINE EXECUTION")',
    'print("=" * 60)',
    '',
    '# Load data',
    'print(f"\\n[LOADING DATA]")',
    'df = pd.read_csv(data_file)',
    'print(f"✓ Loaded {len(df)} samples")',
    'print(f"✓ Columns: {list(df.columns)}")',
    '',
    '# Separate features and target',
    'if target_column in df.columns:',
    '    X = df.drop(columns=[target_column])',
    '    y = df[target_column]',
    '    print(f"✓ Target column: {target_column}")',
    'else:',
    '    X = df',
    '    y = None',
    '    print(f"⚠ No target column found, processing features only")',
    '',
    '# Initialize pipeline variables',
    'current_data = X',
    'model = None',
    'le = None',
    'X_train, X_test, y_train, y_test = None, None, None, None',
    'split_performed = False',
    '',
  ];

  return [
    '',
    ...banner('PIPELINE EXECUTION'),
    '',
    `def execute_pipeline(data_file, target_column='${SCRIPT_CLI.DEFAULT_TARGET}', output_file='${SCRIPT_CLI.DEFAULT_OUTPUT}', skip_split_warning=False):`,
    ...indentLines(body, PIPELINE_BODY_INDENT),
  ];
}

export function stageBannerLines(stage: TStageNumber): string[] {
  const title = `STAGE ${stage}: ${STAGE_TITLES[stage]}`;
  return indentLines([...banner(title), `print(f"\\n[${title}]")`, ''], PIPELINE_BODY_INDENT);
}

export function validationCheckLines(): string[] {
  return indentLines(
    [
      ...banner('VALIDATION CHECK'),
      'if model is not None and not split_performed and not skip_split_warning:',
      '    print(f"\\n⚠ WARNING: Model was trained but no train/test split was performed!")',
      '    print(f"  Metrics shown are from training data and may be overly optimistic.")',
      '    print(f"  Consider adding a train/test split component to Stage 1.")',
      '',
    ],
    PIPELINE_BODY_INDENT
  );
}

export function outputLines(): string[] {
  const body = [
    ...banner('SAVE OUTPUT'),
    'print(f"\\n[SAVING OUTPUT]")',
    '',
    '# Save processed features',
    'if isinstance(current_data, pd.DataFrame):',
    '    current_data.to_csv(output_file, index=False)',
    '    print(f"✓ Processed features saved to: {output_file}")',
    'else:',
    '    print(f"⚠ Could not save output (unsupported data type)")',
    '',
    '# Save test set if available',
    'if X_test is not None:',
    '    output_root, output_ext = os.path.splitext(output_file)',
    "    test_file = f\"{output_root}_test{output_ext or '.csv'}\"",
    '    if isinstance(X_test, pd.DataFrame):',
    '        X_test.to_csv(test_file, index=False)',
    '        print(f"✓ Test features saved to: {test_file}")',
    '',
    'print(f"\\n{\'=\' * 60}")',
    'print("PIPELINE COMPLETED")',
    'print(f"{\'=\' * 60}")',
    '',
    'return {',
    "    'data': current_data,",
    "    'model': model,",
    "    'label_encoder': le,",
    "    'X_train': X_train,",
    "    'X_test': X_test,",
    "    'y_train': y_train,",
    "    'y_test': y_test,",
    "    'split_performed': split_performed,",
    '}',
  ];
  return indentLines(body, PIPELINE_BODY_INDENT);
}

export function entryPointLines(): string[] {
  const { DATA_FLAG, TARGET_FLAG, OUTPUT_FLAG, SKIP_SPLIT_WARNING_FLAG, DEFAULT_TARGET, DEFAULT_OUTPUT } = SCRIPT_CLI;
  return [
    '',
    '',
    ...banner('MAIN ENTRY POINT'),
    '',
    'if __name__ == "__main__":',
    "    parser = argparse.ArgumentParser(description='Execute ML pipeline')",
    `    parser.add_argument('${DATA_FLAG}', required=True, help='Input CSV file')`,
    `    parser.add_argument('${TARGET_FLAG}', default='${DEFAULT_TARGET}', help='Target column name (default: ${DEFAULT_TARGET})')`,
    `    parser.add_argument('${OUTPUT_FLAG}', default='${DEFAULT_OUTPUT}', help='Output file (default: ${DEFAULT_OUTPUT})')`,
    `    parser.add_argument('${SKIP_SPLIT_WARNING_FLAG}', action='store_true', help='Skip train/test split warning')`,
    '',
    '    args = parser.parse_args()',
    '',
    '    try:',
    '        result = execute_pipeline(args.data, args.target, args.output, args.skip_split_warning)',
    '        print(f"\\n✓ Pipeline executed successfully!")',
    '',
    "        if result['model'] is not None:",
    '            print(f"✓ Model trained and ready to use")',
    '',
    "        if result['split_performed']:",
    '            print(f"✓ Train/test split performed")',
    "            if result['X_test'] is not None:",
    '                print(f"  - Training samples: {len(result[\'X_train\'])}")',
    '                print(f"  - Test samples: {len(result[\'X_test\'])}")',
    '',
    '    except FileNotFoundError as e:',
    '        print(f"\\n❌ Error: File not found - {e}")',
    '        print(f"Make sure the file \'{args.data}\' exists")',
    `        sys.exit(${SCRIPT_EXIT_CODES.FILE_NOT_FOUND})`,
    '    except KeyError as e:',
    '        print(f"\\n❌ Error: Column not found - {e}")',
    '        print(f"Make sure the target column \'{args.target}\' exists in your CSV")',
    `        sys.exit(${SCRIPT_EXIT_CODES.MISSING_COLUMN})`,
    '    except Exception as e:',
    '        print(f"\\n❌ Error: {e}")',
    '        traceback.print_exc()',
    `        sys.exit(${SCRIPT_EXIT_CODES.GENERIC_FAILURE})`,
    '',
  ];
}
