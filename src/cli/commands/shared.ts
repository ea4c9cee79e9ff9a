import * as fs from 'fs';
import * as path from 'path';
import { parseManifestJson } from '../../manifest/schema.js';
import type { TWorkflowManifest } from '../../manifest/types.js';
import { CODE_BLOCK_SEPARATOR } from '../../workflow/resolver.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/**
 * What commands need from their surroundings, swappable in tests
 */
export interface CommandContext {
  logger: Logger;
  /** Raw output (generated scripts, script output) */
  write: (text: string) => void;
  now?: () => Date;
}

export function defaultContext(): CommandContext {
  return {
    logger: defaultLogger,
    write: (text) => {
      process.stdout.write(text);
    },
  };
}

function resolveExistingFile(filePath: string): string {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`File not found: ${absolutePath}`);
  }
  return absolutePath;
}

function readExistingFile(filePath: string): string {
  return fs.readFileSync(resolveExistingFile(filePath), 'utf8');
}

export function readManifestFile(manifestPath: string): TWorkflowManifest {
  return parseManifestJson(readExistingFile(manifestPath));
}

/**
 * Read component source files in the given order and join them the way the
 * server joins workflow items.
 */
export function readCodeFiles(codePaths: readonly string[]): string {
  if (codePaths.length === 0) {
    throw new Error('At least one --code file is required');
  }
  return codePaths.map(readExistingFile).join(CODE_BLOCK_SEPARATOR);
}

/**
 * Raw bytes of the input data; the script decodes them itself.
 */
export function readDataFile(dataPath: string): Buffer {
  return fs.readFileSync(resolveExistingFile(dataPath));
}
