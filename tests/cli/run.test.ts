/**
 * Tests for the run command, with the executor replaced by a recording fake
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runCommand } from '../../src/cli/commands/run.js';
import type { ScriptExecutor, TExecuteOptions, TExecutionResult } from '../../src/executor/types.js';
import { createRecordingContext } from '../helpers/cli-context.js';
import { pythonDefinitions } from '../helpers/pipeline-fixtures.js';

const CSV = 'sepal,species\n5.1,setosa\n';

let tempDir: string;
let manifestPath: string;
let codePath: string;
let dataPath: string;

function createExecutor(result: TExecutionResult) {
  const calls: Array<{ script: string; options?: TExecuteOptions }> = [];
  const executor: ScriptExecutor = {
    execute: async (script, options) => {
      calls.push({ script, options });
      return result;
    },
  };
  return { executor, calls };
}

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipesmith-run-'));
  manifestPath = path.join(tempDir, 'workflow.json');
  codePath = path.join(tempDir, 'components.py');
  dataPath = path.join(tempDir, 'iris.csv');
  fs.writeFileSync(manifestPath, JSON.stringify({ nodes: [{ name: 'Scale Features' }] }));
  fs.writeFileSync(codePath, pythonDefinitions('scale_features'));
  fs.writeFileSync(dataPath, CSV);
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('run command', () => {
  it('should run the generated script against the data file', async () => {
    const { executor, calls } = createExecutor({ output: 'PIPELINE COMPLETED\n' });
    const { context, out, written } = createRecordingContext();

    await runCommand(manifestPath, { code: [codePath], data: dataPath, target: 'species' }, context, executor);

    expect(calls).toHaveLength(1);
    expect(calls[0].script).toContain('def execute_pipeline(');
    expect(calls[0].options).toEqual({
      args: ['--data', '/code/data.csv', '--target', 'species'],
      files: { 'data.csv': Buffer.from(CSV) },
    });
    expect(written).toEqual(['PIPELINE COMPLETED\n']);
    expect(out).toEqual(['ℹ Running 1 components on iris.csv', '✓ Pipeline finished']);
  });

  it('should hand the data file over byte for byte', async () => {
    // "Café" in latin-1: 0xe9 is not valid UTF-8 on its own
    const bytes = Buffer.from([0x6e, 0x61, 0x6d, 0x65, 0x0a, 0x43, 0x61, 0x66, 0xe9, 0x0a]);
    fs.writeFileSync(dataPath, bytes);
    const { executor, calls } = createExecutor({ output: '' });
    const { context } = createRecordingContext();

    await runCommand(manifestPath, { code: [codePath], data: dataPath }, context, executor);

    const sent = calls[0].options?.files?.['data.csv'];
    expect(Buffer.isBuffer(sent)).toBe(true);
    expect(sent).toEqual(bytes);
  });

  it('should default the target column', async () => {
    const { executor, calls } = createExecutor({ output: '' });
    const { context } = createRecordingContext();

    await runCommand(manifestPath, { code: [codePath], data: dataPath }, context, executor);

    expect(calls[0].options?.args).toEqual(['--data', '/code/data.csv', '--target', 'target']);
  });

  it('should print the script output and then fail when the script fails', async () => {
    const { executor } = createExecutor({ output: 'Traceback\n', error: 'execution error: exit status 4' });
    const { context, out, written } = createRecordingContext();

    await expect(
      runCommand(manifestPath, { code: [codePath], data: dataPath }, context, executor)
    ).rejects.toThrow('execution error: exit status 4');
    expect(written).toEqual(['Traceback\n']);
    expect(out).toEqual(['ℹ Running 1 components on iris.csv']);
  });

  it('should not start a run when the data file is missing', async () => {
    const { executor, calls } = createExecutor({ output: '' });
    const { context } = createRecordingContext();
    const missing = path.join(tempDir, 'missing.csv');

    await expect(runCommand(manifestPath, { code: [codePath], data: missing }, context, executor)).rejects.toThrow(
      `File not found: ${missing}`
    );
    expect(calls).toEqual([]);
  });
});
