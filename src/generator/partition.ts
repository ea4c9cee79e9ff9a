import { DEFAULT_STAGE, STAGE_NUMBERS } from '../constants.js';
import type { TPipelineNode, TStageBuckets, TStageNumber } from '../manifest/types.js';

/**
 * Stage a node actually runs in: its declared stage when that is an integer
 * from 1 to 4, otherwise stage 1.
 */
export function effectiveStage(stageNumber: number): TStageNumber {
  return STAGE_NUMBERS.find((stage) => stage === stageNumber) ?? DEFAULT_STAGE;
}

/**
 * Group nodes into the four stage buckets, keeping input order within each.
 * All four keys are present even when empty. Never fails.
 */
export function partitionByStage(nodes: readonly TPipelineNode[]): TStageBuckets {
  const buckets: TStageBuckets = { 1: [], 2: [], 3: [], 4: [] };
  for (const node of nodes) {
    buckets[effectiveStage(node.stageNumber)].push(node);
  }
  return buckets;
}
