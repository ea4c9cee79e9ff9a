export type { ScriptExecutor, TExecuteOptions, TExecutionResult } from './types.js';
export {
  DockerScriptExecutor,
  buildDockerArgs,
  defaultDockerExecutorDeps,
  STDERR_MARKER,
  CONTAINER_CODE_DIR,
  SCRIPT_FILE_NAME,
  type DockerExecutorDeps,
  type TDockerExecutorConfig,
  type TProcessResult,
} from './docker-executor.js';
