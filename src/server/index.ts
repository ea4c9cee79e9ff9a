/**
 * Server module exports
 */

export { buildApp, API_PREFIX } from './app.js';
export { PipesmithServer } from './pipesmith-server.js';
export { HttpError, toErrorResponse } from './errors.js';
export type {
  ServerDeps,
  AppOptions,
  PipesmithServerConfig,
  HealthResponse,
  ComponentListResponse,
  StageStatsResponse,
  ErrorResponse,
} from './types.js';
export type { RunResponse } from './routes/workflow.js';
