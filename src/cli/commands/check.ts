/**
 * Check command - report how a manifest partitions into stages and whether
 * the component code defines every function it calls
 */

import { STAGE_NUMBERS, STAGE_TITLES } from '../../constants.js';
import { validateManifestForGeneration } from '../../generator/assembler.js';
import { checkCallableCoverage, type TCallableCoverage } from '../../generator/coverage.js';
import { partitionByStage } from '../../generator/partition.js';
import { defaultContext, readCodeFiles, readManifestFile, type CommandContext } from './shared.js';

export interface CheckOptions {
  code: string[];
}

export async function checkCommand(
  manifestPath: string,
  options: CheckOptions,
  context: CommandContext = defaultContext()
): Promise<TCallableCoverage> {
  const { logger } = context;
  const manifest = readManifestFile(manifestPath);
  const bodyText = readCodeFiles(options.code);

  validateManifestForGeneration(manifest);

  logger.section('Stages');
  const stages = partitionByStage(manifest.nodes);
  for (const stage of STAGE_NUMBERS) {
    logger.log(`  Stage ${stage} (${STAGE_TITLES[stage]}): ${stages[stage].length}`);
  }

  const coverage = checkCallableCoverage(manifest, bodyText);
  logger.section('Definitions');
  logger.info(`${coverage.invoked.length} functions invoked, ${coverage.defined.length} defined`);

  for (const name of coverage.duplicated) {
    logger.warn(`Defined more than once: ${name}`);
  }

  if (coverage.missing.length > 0) {
    for (const name of coverage.missing) {
      logger.error(`Not defined: ${name}`);
    }
    throw new Error(`${coverage.missing.length} invoked function(s) not defined`);
  }

  logger.success('Every invoked function is defined');
  return coverage;
}
