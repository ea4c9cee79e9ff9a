/**
 * Configuration loader
 *
 * Merges, lowest to highest precedence:
 * 1. Default values
 * 2. Config file (`pipesmith.config.yaml` in the working directory, or an explicit path)
 * 3. Environment variables (`PIPESMITH_*`)
 * 4. CLI arguments
 *
 * The merged result is validated before it is returned.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'js-yaml';
import { formatIssues, getErrorMessage } from '../utils/error-utils.js';
import { getDefaultConfig } from './defaults.js';
import { ConfigFileSchema, PipesmithConfigSchema } from './schema.js';
import type { CliConfigOverrides, PartialPipesmithConfig, PipesmithConfig } from './types.js';

const CONFIG_FILE_NAMES = ['pipesmith.config.yaml', 'pipesmith.config.yml'];

const ENV_PREFIX = 'PIPESMITH_';

/** Image variable honored for compatibility with existing deployments */
const LEGACY_IMAGE_ENV = 'PYTHON_DOCKER_IMAGE';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type TLoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export async function loadConfig(
  cliOverrides?: CliConfigOverrides,
  configPath?: string,
  options: TLoadConfigOptions = {}
): Promise<PipesmithConfig> {
  let config = getDefaultConfig();

  const fileConfig = loadConfigFile(configPath, options.cwd ?? process.cwd());
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(options.env ?? process.env));

  if (cliOverrides) {
    config = mergeConfig(config, convertCliOverrides(cliOverrides));
  }

  const validated = PipesmithConfigSchema.safeParse(config);
  if (!validated.success) {
    throw new ConfigError(`Invalid configuration:\n  ${formatIssues(validated.error.issues).join('\n  ')}`);
  }
  return validated.data;
}

function loadConfigFile(configPath: string | undefined, cwd: string): PartialPipesmithConfig | null {
  if (configPath) {
    const absolutePath = path.resolve(cwd, configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    return loadConfigFromPath(absolutePath);
  }

  for (const fileName of CONFIG_FILE_NAMES) {
    const configFilePath = path.join(cwd, fileName);
    if (fs.existsSync(configFilePath)) {
      return loadConfigFromPath(configFilePath);
    }
  }

  return null;
}

/**
 * Parse and validate a YAML config file. An empty file is an empty config.
 */
export function loadConfigFromPath(filePath: string): PartialPipesmithConfig {
  let content: unknown;
  try {
    content = YAML.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${filePath}: ${getErrorMessage(error)}`);
  }

  const parsed = ConfigFileSchema.safeParse(content ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filePath}:\n  ${formatIssues(parsed.error.issues).join('\n  ')}`);
  }
  return parsed.data;
}

/**
 * Read `PIPESMITH_*` variables. Unset or empty variables are ignored.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialPipesmithConfig {
  const config: PartialPipesmithConfig = {};
  const read = (name: string): string | undefined => env[`${ENV_PREFIX}${name}`] || undefined;

  const port = read('PORT');
  const host = read('HOST');
  const cors = read('CORS_ORIGIN');
  if (port || host || cors) {
    config.server = {};
    if (port) config.server.port = Number(port);
    if (host) config.server.host = host;
    if (cors) config.server.corsOrigin = parseCorsOrigin(cors);
  }

  const image = read('PYTHON_IMAGE') ?? (env[LEGACY_IMAGE_ENV] || undefined);
  const memory = read('MEMORY');
  const cpus = read('CPUS');
  const workDir = read('WORK_DIR');
  if (image || memory || cpus || workDir) {
    config.executor = {};
    if (image) config.executor.image = image;
    if (memory) config.executor.memory = memory;
    if (cpus) config.executor.cpus = cpus;
    if (workDir) config.executor.workDir = workDir;
  }

  const store = read('STORE');
  if (store) {
    config.store = { path: store };
  }

  return config;
}

/**
 * `"a, b"` → `['a', 'b']`; a single origin stays a string.
 */
function parseCorsOrigin(value: string): string | string[] {
  const origins = value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');
  return origins.length === 1 ? origins[0] : origins;
}

function convertCliOverrides(overrides: CliConfigOverrides): PartialPipesmithConfig {
  const config: PartialPipesmithConfig = {};

  if (overrides.port !== undefined || overrides.host || overrides.cors) {
    config.server = {};
    if (overrides.port !== undefined) config.server.port = overrides.port;
    if (overrides.host) config.server.host = overrides.host;
    if (overrides.cors) config.server.corsOrigin = parseCorsOrigin(overrides.cors);
  }

  if (overrides.image) {
    config.executor = { image: overrides.image };
  }

  if (overrides.store) {
    config.store = { path: overrides.store };
  }

  return config;
}

export function mergeConfig(base: PipesmithConfig, override: PartialPipesmithConfig): PipesmithConfig {
  return {
    server: { ...base.server, ...override.server },
    executor: { ...base.executor, ...override.executor },
    store: { ...base.store, ...override.store },
  };
}
