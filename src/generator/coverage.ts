/**
 * Static cross-check between the callables a manifest invokes and the
 * top-level `def` statements in the component body text.
 */

import type { TWorkflowManifest } from '../manifest/types.js';
import { resolveCallableName } from './code-utils.js';

const TOP_LEVEL_DEF = /^(?:async\s+)?def\s+([A-Za-z_][A-Za-z0-9_]*)\s*\(/gm;

export type TCallableCoverage = {
  /** Distinct callable names in invocation order */
  invoked: string[];
  /** Distinct names defined at the top level of the body text */
  defined: string[];
  /** Invoked but never defined */
  missing: string[];
  /** Invoked and defined more than once */
  duplicated: string[];
};

/**
 * Names of top-level functions defined in Python source, in source order,
 * repeats included.
 */
export function findDefinedCallables(bodyText: string): string[] {
  return Array.from(bodyText.matchAll(TOP_LEVEL_DEF), (match) => match[1]);
}

export function checkCallableCoverage(manifest: TWorkflowManifest, bodyText: string): TCallableCoverage {
  const definitions = findDefinedCallables(bodyText);
  const counts = new Map<string, number>();
  for (const name of definitions) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  const invoked = [...new Set(manifest.nodes.map(resolveCallableName))];

  return {
    invoked,
    defined: [...counts.keys()],
    missing: invoked.filter((name) => !counts.has(name)),
    duplicated: invoked.filter((name) => (counts.get(name) ?? 0) > 1),
  };
}
