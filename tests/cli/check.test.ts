/**
 * Tests for the check command
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { checkCommand } from '../../src/cli/commands/check.js';
import { createRecordingContext } from '../helpers/cli-context.js';
import { pythonDefinitions } from '../helpers/pipeline-fixtures.js';

let tempDir: string;
let manifestPath: string;
let codePath: string;

function writeFixture(manifest: unknown, code: string): void {
  fs.writeFileSync(manifestPath, JSON.stringify(manifest));
  fs.writeFileSync(codePath, code);
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipesmith-check-'));
  manifestPath = path.join(tempDir, 'workflow.json');
  codePath = path.join(tempDir, 'components.py');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('check command', () => {
  it('should list stage sizes and confirm full coverage', async () => {
    writeFixture(
      {
        nodes: [
          { name: 'Scale Features', stage: 1 },
          { name: 'Train Test Split', stage: 1 },
          { name: 'Random Forest', stage: 3 },
        ],
      },
      pythonDefinitions('scale_features', 'train_test_split', 'random_forest', 'helper')
    );
    const { context, out, err } = createRecordingContext();

    const coverage = await checkCommand(manifestPath, { code: [codePath] }, context);

    expect(coverage.missing).toEqual([]);
    expect(out).toEqual([
      '',
      '━━━ Stages ━━━',
      '  Stage 1 (PREPROCESSING): 2',
      '  Stage 2 (FEATURE ENGINEERING): 0',
      '  Stage 3 (MODEL TRAINING): 1',
      '  Stage 4 (EVALUATION): 0',
      '',
      '━━━ Definitions ━━━',
      'ℹ 3 functions invoked, 4 defined',
      '✓ Every invoked function is defined',
    ]);
    expect(err).toEqual([]);
  });

  it('should warn on duplicates and fail on missing definitions', async () => {
    writeFixture(
      {
        nodes: [
          { name: 'Remove Outliers', stage: 1 },
          { name: 'Random Forest', stage: 3 },
          { name: 'Accuracy', stage: 4 },
        ],
      },
      pythonDefinitions('remove_outliers', 'random_forest', 'remove_outliers')
    );
    const { context, out, err } = createRecordingContext();

    await expect(checkCommand(manifestPath, { code: [codePath] }, context)).rejects.toThrow(
      '1 invoked function(s) not defined'
    );
    expect(out[out.length - 1]).toBe('ℹ 3 functions invoked, 2 defined');
    expect(err).toEqual(['⚠ Defined more than once: remove_outliers', '✗ Not defined: accuracy']);
  });

  it('should reject manifests that cannot be generated before checking code', async () => {
    writeFixture({ nodes: [] }, pythonDefinitions('anything'));
    const { context, out } = createRecordingContext();

    await expect(checkCommand(manifestPath, { code: [codePath] }, context)).rejects.toThrow(
      'Workflow manifest has no nodes'
    );
    expect(out).toEqual([]);
  });
});
