/**
 * Run command - generate a script and execute it in the Docker sandbox
 */

import * as path from 'path';
import { SCRIPT_CLI } from '../../constants.js';
import { loadConfig } from '../../config/loader.js';
import { CONTAINER_CODE_DIR, DockerScriptExecutor } from '../../executor/docker-executor.js';
import type { ScriptExecutor } from '../../executor/types.js';
import { assembleScript } from '../../generator/assembler.js';
import { defaultContext, readCodeFiles, readDataFile, readManifestFile, type CommandContext } from './shared.js';

export interface RunOptions {
  code: string[];
  /** CSV passed to the script as --data */
  data: string;
  /** Label column passed as --target */
  target?: string;
  strict?: boolean;
  /** Docker image override */
  image?: string;
  config?: string;
}

/** Name the data file gets inside the run directory */
const DATA_FILE_NAME = 'data.csv';

/**
 * @example
 * ```bash
 * pipesmith run workflow.json --code components.py --data iris.csv --target species
 * ```
 */
export async function runCommand(
  manifestPath: string,
  options: RunOptions,
  context: CommandContext = defaultContext(),
  executor?: ScriptExecutor
): Promise<void> {
  const { logger } = context;
  const manifest = readManifestFile(manifestPath);
  const script = assembleScript(manifest, readCodeFiles(options.code), { now: context.now, strict: options.strict });
  const data = readDataFile(options.data);

  let runner = executor;
  if (!runner) {
    const config = await loadConfig({ image: options.image }, options.config);
    runner = new DockerScriptExecutor(config.executor);
    logger.debug(`Docker image: ${config.executor.image}`);
  }

  logger.info(`Running ${manifest.nodes.length} components on ${path.basename(options.data)}`);
  const result = await runner.execute(script, {
    args: [
      SCRIPT_CLI.DATA_FLAG,
      `${CONTAINER_CODE_DIR}/${DATA_FILE_NAME}`,
      SCRIPT_CLI.TARGET_FLAG,
      options.target ?? SCRIPT_CLI.DEFAULT_TARGET,
    ],
    files: { [DATA_FILE_NAME]: data },
  });

  context.write(result.output);
  if (result.error) {
    throw new Error(result.error);
  }
  logger.success('Pipeline finished');
}
