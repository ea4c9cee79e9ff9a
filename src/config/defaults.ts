import * as os from 'os';
import * as path from 'path';
import type { PipesmithConfig } from './types.js';

export const DEFAULT_PYTHON_IMAGE = 'python:3.11-slim';

export function getDefaultConfig(): PipesmithConfig {
  return {
    server: {
      port: 8080,
      host: 'localhost',
      corsOrigin: '*',
    },
    executor: {
      image: DEFAULT_PYTHON_IMAGE,
      memory: '2g',
      cpus: '2',
      workDir: path.join(os.tmpdir(), 'pipesmith-exec'),
    },
    store: {},
  };
}
