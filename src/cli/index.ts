#!/usr/bin/env node
/**
 * Pipesmith CLI
 * Generate, check and run ML pipeline scripts; serve the component API
 */

import { Command, InvalidArgumentError } from 'commander';
import { checkCommand } from './commands/check.js';
import { generateCommand } from './commands/generate.js';
import { runCommand } from './commands/run.js';
import { serveCommand } from './commands/serve.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

const version = process.env.npm_package_version ?? '0.0.0-dev';

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer from 0 to 65535');
  }
  return port;
}

async function runAction(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    logger.error(`Command failed: ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

const program = new Command();

program
  .name('pipesmith')
  .description('Generate standalone Python ML pipeline scripts from workflow manifests')
  .version(version, '-v, --version', 'Output the current version');

program.configureOutput({
  writeErr: (str) => {
    const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
    if (trimmed) {
      logger.error(trimmed);
    }
  },
  writeOut: (str) => process.stdout.write(str),
});

program
  .command('generate <manifest>')
  .description('Generate a Python script from a workflow manifest and component code')
  .requiredOption('-c, --code <files...>', 'Component source files, in order')
  .option('-o, --output <file>', 'Output file (default: stdout)')
  .option('--strict', 'Fail unless every invoked function is defined exactly once', false)
  .action(async (manifest: string, options: { code: string[]; output?: string; strict: boolean }) => {
    await runAction(() => generateCommand(manifest, options));
  });

program
  .command('check <manifest>')
  .description('Report stage partitioning and missing function definitions')
  .requiredOption('-c, --code <files...>', 'Component source files, in order')
  .action(async (manifest: string, options: { code: string[] }) => {
    await runAction(() => checkCommand(manifest, options));
  });

program
  .command('run <manifest>')
  .description('Generate a script and execute it in a Docker sandbox')
  .requiredOption('-c, --code <files...>', 'Component source files, in order')
  .requiredOption('-d, --data <csv>', 'Input CSV file')
  .option('-t, --target <column>', 'Target column name')
  .option('--strict', 'Fail unless every invoked function is defined exactly once', false)
  .option('--image <image>', 'Docker image with Python and the component libraries')
  .option('--config <file>', 'Config file (default: pipesmith.config.yaml)')
  .action(
    async (
      manifest: string,
      options: { code: string[]; data: string; target?: string; strict: boolean; image?: string; config?: string }
    ) => {
      await runAction(() => runCommand(manifest, options));
    }
  );

program
  .command('serve')
  .description('Start the component and workflow HTTP API')
  .option('-p, --port <port>', 'Port to listen on', parsePort)
  .option('-H, --host <host>', 'Host to bind to')
  .option('--cors <origins>', 'Allowed CORS origins, comma-separated')
  .option('--store <file>', 'JSON file backing the component store')
  .option('--config <file>', 'Config file (default: pipesmith.config.yaml)')
  .action(
    async (options: { port?: number; host?: string; cors?: string; store?: string; config?: string }) => {
      await runAction(() => serveCommand(options));
    }
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(getErrorMessage(error));
  process.exit(1);
});
