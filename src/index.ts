/**
 * # Pipesmith
 *
 * Turns an ordered list of ML pipeline components into one standalone Python
 * script with a four-stage `execute_pipeline()` and a command-line entry
 * point.
 *
 * ```ts
 * import { parseManifest, assembleScript } from 'pipesmith';
 *
 * const manifest = parseManifest(JSON.parse(manifestJson));
 * const script = assembleScript(manifest, componentSource, { strict: true });
 * ```
 *
 * Around the generator sit a component store, a Docker executor, an HTTP API
 * and the `pipesmith` CLI.
 */

export * from './manifest/index.js';
export * from './generator/index.js';
export * from './store/index.js';
export * from './workflow/index.js';
export * from './executor/index.js';
export * from './config/index.js';
export * from './server/index.js';
export { getErrorMessage, wrapError } from './utils/error-utils.js';
export {
  STAGE_NUMBERS,
  STAGE_TITLES,
  NODE_ROLES,
  SCRIPT_CLI,
  SCRIPT_EXIT_CODES,
} from './constants.js';
