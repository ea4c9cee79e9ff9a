/**
 * Call-shape resolution.
 *
 * An explicit `role` on the node wins when it applies to the node's stage.
 * Otherwise the callable name is matched against keyword lists; this is a
 * fallback for manifests exported before nodes carried roles.
 */

import {
  CROSS_VALIDATION_NAME_KEYWORDS,
  ROW_FILTER_NAME_KEYWORDS,
  SPLIT_NAME_KEYWORDS,
} from '../constants.js';
import type { TNodeRole, TPipelineNode, TStageNumber } from '../manifest/types.js';

function containsAny(name: string, keywords: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

export function matchesSplitName(callableName: string): boolean {
  return containsAny(callableName, SPLIT_NAME_KEYWORDS);
}

export function matchesCrossValidationName(callableName: string): boolean {
  return containsAny(callableName, CROSS_VALIDATION_NAME_KEYWORDS);
}

export function matchesRowFilterName(callableName: string): boolean {
  return containsAny(callableName, ROW_FILTER_NAME_KEYWORDS);
}

const STAGE_ROLES: Record<TStageNumber, readonly TNodeRole[]> = {
  1: ['transform', 'row-filter', 'split'],
  2: ['transform', 'row-filter', 'split'],
  3: ['fit'],
  4: ['metrics', 'cross-validation'],
};

/**
 * Decide how a node is invoked in the given stage.
 */
export function resolveCallShape(node: TPipelineNode, callableName: string, stage: TStageNumber): TNodeRole {
  if (node.role && STAGE_ROLES[stage].includes(node.role)) {
    return node.role;
  }

  switch (stage) {
    case 1:
    case 2:
      if (matchesSplitName(callableName)) return 'split';
      if (matchesRowFilterName(callableName)) return 'row-filter';
      return 'transform';
    case 3:
      return 'fit';
    case 4:
      return matchesCrossValidationName(callableName) ? 'cross-validation' : 'metrics';
  }
}
