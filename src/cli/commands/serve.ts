/**
 * Serve command - start the HTTP API
 */

import { loadConfig } from '../../config/loader.js';
import { DockerScriptExecutor } from '../../executor/docker-executor.js';
import { PipesmithServer } from '../../server/pipesmith-server.js';
import { API_PREFIX } from '../../server/app.js';
import { InMemoryComponentStore } from '../../store/memory-store.js';
import { JsonFileComponentStore } from '../../store/json-file-store.js';
import type { ComponentStore } from '../../store/types.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { logger } from '../utils/logger.js';

export interface ServeOptions {
  port?: number;
  host?: string;
  cors?: string;
  /** JSON file backing the component store */
  store?: string;
  config?: string;
}

/**
 * @example
 * ```bash
 * pipesmith serve --port 8080 --store ./components.json
 * ```
 */
export async function serveCommand(options: ServeOptions): Promise<void> {
  const config = await loadConfig(
    { port: options.port, host: options.host, cors: options.cors, store: options.store },
    options.config
  );

  const store: ComponentStore = config.store.path
    ? await JsonFileComponentStore.open(config.store.path)
    : new InMemoryComponentStore();
  const executor = new DockerScriptExecutor(config.executor);

  const { port, host, corsOrigin } = config.server;
  logger.section('Pipesmith API');
  logger.info(`Server: http://${host}:${port}${API_PREFIX}`);
  logger.info(`Component store: ${config.store.path ?? 'in-memory'}`);
  logger.info(`Python image: ${config.executor.image}`);
  logger.newline();

  const server = new PipesmithServer({ port, host, corsOrigin }, { store, executor });

  const shutdown = async (signal: string): Promise<void> => {
    logger.newline();
    logger.info(`Received ${signal}, shutting down...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error(`Shutdown failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  if (process.platform !== 'win32') process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await server.start();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EADDRINUSE') {
      throw new Error(`Port ${port} is already in use. Try a different port with --port <number>`);
    }
    throw error;
  }
  logger.success('Listening');
}
