/**
 * Type definitions for the HTTP server
 */

import type { ScriptExecutor } from '../executor/types.js';
import type { ComponentStore, TComponentRecord, TStageStat } from '../store/types.js';

/**
 * Collaborators injected into the route handlers
 */
export interface ServerDeps {
  store: ComponentStore;
  executor: ScriptExecutor;
  /** Clock for script header timestamps and the health endpoint */
  now?: () => Date;
}

export interface AppOptions extends ServerDeps {
  /** CORS origin configuration */
  corsOrigin: string | string[];
}

export interface PipesmithServerConfig {
  port: number;
  host: string;
  corsOrigin: string | string[];
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  /** Seconds since the app was built */
  uptime: number;
}

export interface ComponentListResponse {
  /** Components in this page */
  count: number;
  /** Matches before pagination */
  total: number;
  components: TComponentRecord[];
}

export interface StageStatsResponse {
  stats: TStageStat[];
}

export interface ErrorResponse {
  error: string;
}
