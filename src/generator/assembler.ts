/**
 * Script Assembler
 *
 * Stitches the fixed skeleton around the per-node invocations:
 *
 * 1. header (shebang, docstring, imports)
 * 2. component bodies, verbatim
 * 3. `execute_pipeline()` with one block per non-empty stage, 1 → 4
 * 4. split validation warning and output persistence
 * 5. command-line entry point
 *
 * The manifest is validated up front so a malformed manifest never yields
 * partial text.
 *
 * @module generator/assembler
 */

import { STAGE_NUMBERS } from '../constants.js';
import type { TWorkflowManifest } from '../manifest/types.js';
import { resolveCallableName } from './code-utils.js';
import { checkCallableCoverage } from './coverage.js';
import { ScriptGenerationError } from './errors.js';
import { buildInvocationLines } from './invocation.js';
import { serializeBindings } from './literals.js';
import { partitionByStage } from './partition.js';
import {
  entryPointLines,
  headerLines,
  outputLines,
  pipelineStartLines,
  stageBannerLines,
  validationCheckLines,
} from './skeleton.js';

export type TAssembleOptions = {
  /** Clock for the header timestamp (default: current time) */
  now?: () => Date;
  /**
   * Require every invoked callable to be defined exactly once in the
   * component body text.
   */
  strict?: boolean;
};

/**
 * Check a manifest can be generated without emitting anything.
 * Throws ScriptGenerationError on the first problem.
 */
export function validateManifestForGeneration(manifest: TWorkflowManifest): void {
  if (manifest.nodes.length === 0) {
    throw new ScriptGenerationError('EMPTY_MANIFEST', 'Workflow manifest has no nodes');
  }

  const seen = new Set<string>();
  for (const node of manifest.nodes) {
    if (seen.has(node.identifier)) {
      throw new ScriptGenerationError(
        'DUPLICATE_NODE_ID',
        `Node id "${node.identifier}" appears more than once in the manifest`,
        node.identifier
      );
    }
    seen.add(node.identifier);
    resolveCallableName(node);
    serializeBindings(node.variableBindings, { nodeId: node.identifier });
  }
}

function assertDefinitions(manifest: TWorkflowManifest, componentBodyText: string): void {
  const coverage = checkCallableCoverage(manifest, componentBodyText);
  if (coverage.missing.length > 0) {
    throw new ScriptGenerationError(
      'UNDEFINED_CALLABLE',
      `Component code does not define: ${coverage.missing.join(', ')}`
    );
  }
  if (coverage.duplicated.length > 0) {
    throw new ScriptGenerationError(
      'DUPLICATE_DEFINITION',
      `Component code defines more than once: ${coverage.duplicated.join(', ')}`
    );
  }
}

/**
 * Generate the complete, standalone Python script for a workflow.
 *
 * @param manifest - Ordered nodes plus header metadata
 * @param componentBodyText - Concatenated component source, inserted verbatim
 */
export function assembleScript(
  manifest: TWorkflowManifest,
  componentBodyText: string,
  options: TAssembleOptions = {}
): string {
  validateManifestForGeneration(manifest);
  if (options.strict) {
    assertDefinitions(manifest, componentBodyText);
  }

  const now = options.now ?? (() => new Date());
  const stages = partitionByStage(manifest.nodes);

  const lines: string[] = [
    ...headerLines({
      generatedAt: now().toISOString(),
      formatVersion: manifest.formatVersion,
      exportedAt: manifest.exportedAt,
      componentCount: manifest.nodes.length,
    }),
    componentBodyText,
    ...pipelineStartLines(),
  ];

  for (const stage of STAGE_NUMBERS) {
    const nodes = stages[stage];
    if (nodes.length === 0) continue;

    lines.push(...stageBannerLines(stage));
    nodes.forEach((node, i) => {
      lines.push(...buildInvocationLines(node, i + 1, nodes.length, stage));
    });
  }

  lines.push(...validationCheckLines(), ...outputLines(), ...entryPointLines());
  return lines.join('\n');
}
