/**
 * Turns stored components into generator inputs.
 *
 * Two flavours:
 * - `resolveWorkflowItems`: an ordered list of component ids and inline
 *   code, concatenated into one body (used for direct execution)
 * - `buildManifestFromComponents`: component references plus bindings,
 *   producing a manifest and the matching body text for script generation
 */

import type { TPipelineNode, TWorkflowManifest } from '../manifest/types.js';
import { toBindingMap } from '../manifest/bindings.js';
import { findDefinedCallables } from '../generator/coverage.js';
import { ComponentNotFoundError } from '../store/errors.js';
import type { ComponentStore, TComponentRecord, TComponentStage } from '../store/types.js';
import type { TComponentEntry, TWorkflowItem } from './schema.js';

/** Blank line between concatenated code blocks */
export const CODE_BLOCK_SEPARATOR = '\n\n';

/** Manifest format version stamped on manifests built from stored components */
export const COMPONENT_MANIFEST_VERSION = '1.0';

export type TResolvedItem =
  | {
      index: number;
      type: 'component';
      id: string;
      name: string;
      description: string;
      stage: TComponentStage;
      language: string;
      inputs: TComponentRecord['inputs'];
      output?: TComponentRecord['output'];
    }
  | {
      index: number;
      type: 'raw_code';
      code: string;
    };

export type TResolvedWorkflow = {
  code: string;
  items: TResolvedItem[];
};

export type TComponentWorkflow = {
  manifest: TWorkflowManifest;
  bodyText: string;
};

async function requireComponent(store: ComponentStore, id: string, index: number): Promise<TComponentRecord> {
  const component = await store.findById(id);
  if (!component) {
    throw new ComponentNotFoundError(id, index);
  }
  return component;
}

/**
 * Fetch referenced components in item order and join every code block.
 * Throws ComponentNotFoundError naming the first missing item.
 */
export async function resolveWorkflowItems(
  items: readonly TWorkflowItem[],
  store: ComponentStore
): Promise<TResolvedWorkflow> {
  const blocks: string[] = [];
  const resolved: TResolvedItem[] = [];

  for (const [index, item] of items.entries()) {
    if (item.type === 'code') {
      blocks.push(item.value);
      resolved.push({ index, type: 'raw_code', code: item.value });
      continue;
    }

    const component = await requireComponent(store, item.value, index);
    blocks.push(component.code);
    resolved.push({
      index,
      type: 'component',
      id: component.id,
      name: component.name,
      description: component.description,
      stage: component.stage,
      language: component.language,
      inputs: component.inputs,
      output: component.output,
    });
  }

  return { code: blocks.join(CODE_BLOCK_SEPARATOR), items: resolved };
}

/**
 * `"stage3"` → 3. The store only holds the four valid stage names.
 */
export function componentStageNumber(stage: TComponentStage): number {
  return Number.parseInt(stage.slice('stage'.length), 10);
}

/**
 * Build a manifest node per entry and the body text that defines them.
 *
 * Each node calls the first top-level function its component defines. A
 * component used by several entries contributes its code once.
 */
export async function buildManifestFromComponents(
  entries: readonly TComponentEntry[],
  store: ComponentStore,
  options: { exportedAt?: string } = {}
): Promise<TComponentWorkflow> {
  const nodes: TPipelineNode[] = [];
  const bodies = new Map<string, string>();

  for (const [index, entry] of entries.entries()) {
    const component = await requireComponent(store, entry.componentId, index);
    if (!bodies.has(component.id)) {
      bodies.set(component.id, component.code);
    }

    const [firstDefinition] = findDefinedCallables(component.code);
    nodes.push({
      identifier: `${component.id}:${index}`,
      displayName: entry.name ?? component.name,
      stageNumber: componentStageNumber(component.stage),
      codeIdentifier: firstDefinition,
      role: entry.role,
      description: component.description || undefined,
      declaredInputs: component.inputs.map((input) => ({ name: input.name, type: input.type })),
      declaredOutput: component.output,
      variableBindings: toBindingMap(entry.variables ?? {}),
    });
  }

  return {
    manifest: {
      formatVersion: COMPONENT_MANIFEST_VERSION,
      exportedAt: options.exportedAt,
      nodes,
    },
    bodyText: [...bodies.values()].join(CODE_BLOCK_SEPARATOR),
  };
}
