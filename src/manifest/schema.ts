/**
 * Wire format of workflow manifests and its conversion to typed nodes.
 *
 * The JSON shape follows what the workflow editor exports:
 *
 * ```json
 * {
 *   "version": "1.0",
 *   "exported_at": "2024-05-01T10:00:00Z",
 *   "nodes": [
 *     { "id": "n1", "name": "Remove Outliers", "stage": 1, "variables": { "threshold": 3 } }
 *   ]
 * }
 * ```
 *
 * `code` on a node is the explicit callable name, not a source body.
 */

import { z } from 'zod';
import { NODE_ROLES } from '../constants.js';
import { formatIssues, getErrorMessage } from '../utils/error-utils.js';
import { toBindingMap } from './bindings.js';
import type { TPipelineNode, TRawBindingValue, TWorkflowManifest } from './types.js';

export class ManifestValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid workflow manifest:\n  ${issues.join('\n  ')}`);
    this.name = 'ManifestValidationError';
  }
}

export const RawBindingValueSchema: z.ZodType<TRawBindingValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(RawBindingValueSchema)], {
    errorMap: () => ({
      message: 'Binding values must be a string, number, boolean, null or list; pass dict literals as a string',
    }),
  })
);

const StageSchema = z.union([z.number(), z.string()]).transform(parseStageNumber);

export const RawNodeSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).optional(),
  name: z.string().default(''),
  stage: StageSchema.default(1),
  description: z.string().optional(),
  code: z.string().default(''),
  role: z.enum(NODE_ROLES).optional(),
  inputs: z
    .array(z.object({ name: z.string(), type: z.string() }).passthrough())
    .default([]),
  output: z.record(z.unknown()).optional(),
  variables: z.record(RawBindingValueSchema).default({}),
});

export const RawManifestSchema = z.object({
  version: z.string().default(''),
  exported_at: z.string().optional(),
  nodes: z.array(RawNodeSchema),
});

export type TRawNode = z.input<typeof RawNodeSchema>;
export type TRawManifest = z.input<typeof RawManifestSchema>;

/**
 * Accepts `3`, `"3"` and `"stage3"`. Anything unparseable becomes 0, which
 * the partitioner folds into stage 1.
 */
export function parseStageNumber(stage: number | string): number {
  if (typeof stage === 'number') return stage;
  const match = /^\s*(?:stage)?\s*(-?\d+)\s*$/i.exec(stage);
  return match ? Number.parseInt(match[1], 10) : 0;
}

/**
 * Ids for nodes sent without one: `node-<position>`, suffixed when that is
 * already taken by an explicit id or an earlier default.
 */
function assignNodeIds(ids: ReadonlyArray<string | undefined>): string[] {
  const taken = new Set(ids.filter((id): id is string => id !== undefined));
  return ids.map((id, index) => {
    if (id !== undefined) return id;
    const base = `node-${index + 1}`;
    let candidate = base;
    for (let suffix = 2; taken.has(candidate); suffix++) {
      candidate = `${base}-${suffix}`;
    }
    taken.add(candidate);
    return candidate;
  });
}

/**
 * Validate a manifest as received over the wire and convert it to typed nodes.
 * Throws ManifestValidationError listing every problem found.
 */
export function parseManifest(input: unknown): TWorkflowManifest {
  const parsed = RawManifestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ManifestValidationError(formatIssues(parsed.error.issues));
  }

  const identifiers = assignNodeIds(parsed.data.nodes.map((raw) => raw.id));
  const nodes: TPipelineNode[] = parsed.data.nodes.map((raw, index) => ({
    identifier: identifiers[index],
    displayName: raw.name,
    stageNumber: raw.stage,
    codeIdentifier: raw.code || undefined,
    role: raw.role,
    description: raw.description,
    declaredInputs: raw.inputs.map((input) => ({ name: input.name, type: input.type })),
    declaredOutput: raw.output,
    variableBindings: toBindingMap(raw.variables),
  }));

  return {
    formatVersion: parsed.data.version,
    exportedAt: parsed.data.exported_at,
    nodes,
  };
}

/**
 * Parse manifest JSON text.
 */
export function parseManifestJson(text: string): TWorkflowManifest {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ManifestValidationError([`Manifest is not valid JSON: ${getErrorMessage(error)}`]);
  }
  return parseManifest(data);
}
