/**
 * Docker-backed script executor.
 *
 * Every run gets its own directory under the work directory, holding the
 * script and any input files, and mounted as `/code`:
 *
 * ```
 * docker run --rm --name pipesmith_<runId> -v <runDir>:/code --network none --memory <m> --cpus <c> <image> python /code/script.py [args...]
 * ```
 *
 * The run directory is removed afterwards. There is no timeout; callers that
 * need one pass an AbortSignal. Aborting kills the container by name, since
 * `python` runs as PID 1 there and ignores the SIGTERM the client forwards.
 */

import { spawn } from 'child_process';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { getErrorMessage, wrapError } from '../utils/error-utils.js';
import type { ScriptExecutor, TExecuteOptions, TExecutionResult } from './types.js';

/** Appended between stdout and stderr when a successful run wrote to stderr */
export const STDERR_MARKER = '\n[STDERR]\n';

/** Mount point of the run directory inside the container */
export const CONTAINER_CODE_DIR = '/code';

export const SCRIPT_FILE_NAME = 'script.py';

export const CONTAINER_NAME_PREFIX = 'pipesmith_';

export type TProcessResult = {
  stdout: string;
  stderr: string;
  /** null when the process was killed by a signal */
  exitCode: number | null;
  signal?: string | null;
};

export interface DockerExecutorDeps {
  runProcess: (command: string, args: string[], options: { signal?: AbortSignal }) => Promise<TProcessResult>;
  mkdir: (dirPath: string) => Promise<void>;
  writeFile: (filePath: string, content: Buffer | string) => Promise<void>;
  removeDir: (dirPath: string) => Promise<void>;
  createRunId: () => string;
}

export type TDockerExecutorConfig = {
  image: string;
  memory: string;
  cpus: string;
  /** Host directory run directories are created in */
  workDir: string;
};

function runWithSpawn(
  command: string,
  args: string[],
  options: { signal?: AbortSignal }
): Promise<TProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], signal: options.signal });
    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (err) => {
      // An abort is followed by 'close' with the kill signal, reported there
      if (err.name === 'AbortError') return;
      reject(err);
    });
    child.on('close', (exitCode, signal) => {
      resolve({ stdout, stderr, exitCode, signal });
    });
  });
}

export function defaultDockerExecutorDeps(): DockerExecutorDeps {
  return {
    runProcess: runWithSpawn,
    mkdir: async (dirPath) => {
      await fs.promises.mkdir(dirPath, { recursive: true });
    },
    writeFile: async (filePath, content) => {
      await fs.promises.writeFile(filePath, content);
    },
    removeDir: async (dirPath) => {
      await fs.promises.rm(dirPath, { recursive: true, force: true });
    },
    createRunId: () => `run_${Date.now()}_${crypto.randomBytes(4).toString('hex')}`,
  };
}

/**
 * The `docker run` argument list for one run directory.
 */
export function buildDockerArgs(
  config: TDockerExecutorConfig,
  runDir: string,
  containerName: string,
  scriptArgs: string[] = []
): string[] {
  return [
    'run',
    '--rm',
    '--name',
    containerName,
    '-v',
    `${runDir}:${CONTAINER_CODE_DIR}`,
    '--network',
    'none',
    '--memory',
    config.memory,
    '--cpus',
    config.cpus,
    config.image,
    'python',
    `${CONTAINER_CODE_DIR}/${SCRIPT_FILE_NAME}`,
    ...scriptArgs,
  ];
}

function assertPlainFileName(name: string): void {
  if (name === '' || name === SCRIPT_FILE_NAME || path.basename(name) !== name || name.startsWith('.')) {
    throw new Error(`Invalid input file name: "${name}"`);
  }
}

const ABORTED_ERROR = 'execution error: aborted';

function describeFailure(result: TProcessResult): string {
  if (result.exitCode === null) {
    return `execution error: killed by ${result.signal ?? 'signal'}`;
  }
  return `execution error: exit status ${result.exitCode}`;
}

export class DockerScriptExecutor implements ScriptExecutor {
  private readonly deps: DockerExecutorDeps;

  constructor(
    private readonly config: TDockerExecutorConfig,
    deps: Partial<DockerExecutorDeps> = {}
  ) {
    this.deps = { ...defaultDockerExecutorDeps(), ...deps };
  }

  async execute(script: string, options: TExecuteOptions = {}): Promise<TExecutionResult> {
    const files = Object.entries(options.files ?? {});
    files.forEach(([name]) => assertPlainFileName(name));

    if (options.signal?.aborted) {
      return { output: '', error: ABORTED_ERROR };
    }

    const runId = this.deps.createRunId();
    const runDir = path.resolve(this.config.workDir, runId);
    const containerName = `${CONTAINER_NAME_PREFIX}${runId}`;

    try {
      try {
        await this.deps.mkdir(runDir);
        await this.deps.writeFile(path.join(runDir, SCRIPT_FILE_NAME), script);
        for (const [name, content] of files) {
          await this.deps.writeFile(path.join(runDir, name), content);
        }
      } catch (error) {
        throw wrapError(error, 'Failed to prepare script for execution');
      }

      let result: TProcessResult;
      const stopContainer = this.killOnAbort(containerName, options.signal);
      try {
        result = await this.deps.runProcess(
          'docker',
          buildDockerArgs(this.config, runDir, containerName, options.args),
          { signal: options.signal }
        );
      } catch (error) {
        return { output: '', error: `execution error: ${getErrorMessage(error)}` };
      } finally {
        await stopContainer();
      }

      if (options.signal?.aborted) {
        return { output: result.stderr, error: ABORTED_ERROR };
      }
      if (result.exitCode !== 0) {
        return { output: result.stderr, error: describeFailure(result) };
      }

      const output = result.stderr.length > 0 ? result.stdout + STDERR_MARKER + result.stderr : result.stdout;
      return { output };
    } finally {
      await this.deps.removeDir(runDir);
    }
  }

  /**
   * Issue `docker kill` when the signal fires. The returned function detaches
   * the listener and waits for a kill in flight, so the run directory is only
   * removed once the container is gone.
   */
  private killOnAbort(containerName: string, signal?: AbortSignal): () => Promise<void> {
    if (!signal) return async () => {};

    let kill: Promise<void> | undefined;
    let killError: unknown;
    const onAbort = (): void => {
      kill = this.deps.runProcess('docker', ['kill', containerName], {}).then(
        () => undefined,
        (error: unknown) => {
          killError = error;
        }
      );
    };
    signal.addEventListener('abort', onAbort, { once: true });

    return async () => {
      signal.removeEventListener('abort', onAbort);
      await kill;
      if (killError !== undefined) {
        throw wrapError(killError, `Failed to stop container ${containerName}`);
      }
    };
  }
}
