/**
 * Configuration types for the server and the script executor
 */

export interface PipesmithConfig {
  server: ServerConfig;
  executor: ExecutorConfig;
  store: StoreConfig;
}

export interface ServerConfig {
  /** Port to listen on */
  port: number;
  /** Host to bind to */
  host: string;
  /** Allowed CORS origins */
  corsOrigin: string | string[];
}

/**
 * Docker sandbox used to run scripts
 */
export interface ExecutorConfig {
  /** Python image; must have the libraries the components import */
  image: string;
  /** Container memory limit, as passed to `docker run --memory` */
  memory: string;
  /** Container CPU limit, as passed to `docker run --cpus` */
  cpus: string;
  /** Host directory scripts are written to and mounted from */
  workDir: string;
}

export interface StoreConfig {
  /** JSON file backing the component store; in-memory when unset */
  path?: string;
}

export interface PartialPipesmithConfig {
  server?: Partial<ServerConfig>;
  executor?: Partial<ExecutorConfig>;
  store?: Partial<StoreConfig>;
}

/**
 * CLI flags that override configuration
 */
export interface CliConfigOverrides {
  port?: number;
  host?: string;
  cors?: string;
  store?: string;
  image?: string;
}
