/**
 * Workflow manifest types consumed by the script generator.
 */

import type { NODE_ROLES, STAGE_NUMBERS } from '../constants.js';

export type TStageNumber = (typeof STAGE_NUMBERS)[number];

/**
 * Call-shape role a caller may pin on a node. Nodes without one are
 * classified by their callable name.
 */
export type TNodeRole = (typeof NODE_ROLES)[number];

/**
 * A bound parameter value. Closed set: anything a manifest carries outside
 * these variants is rejected when the manifest is parsed.
 */
export type TBindingValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'sequence'; items: TBindingValue[] }
  | { kind: 'null' };

export type TBindingKind = TBindingValue['kind'];

export type TDeclaredInput = {
  name: string;
  type: string;
};

export type TPipelineNode = {
  /** Caller-assigned handle, never interpreted */
  identifier: string;
  /** Human label; source of the callable name when codeIdentifier is empty */
  displayName: string;
  /** 1-4; anything else runs in stage 1 */
  stageNumber: number;
  /** Explicit callable name */
  codeIdentifier?: string;
  role?: TNodeRole;
  description?: string;
  /** Informational signature metadata, not enforced at generation time */
  declaredInputs: TDeclaredInput[];
  declaredOutput?: Record<string, unknown>;
  variableBindings: Record<string, TBindingValue>;
};

export type TWorkflowManifest = {
  /** Echoed into the script header, never validated */
  formatVersion: string;
  exportedAt?: string;
  nodes: TPipelineNode[];
};

/** Every stage key is always present, even when empty */
export type TStageBuckets = Record<TStageNumber, TPipelineNode[]>;

/** JSON shape a binding arrives in before it is tagged */
export type TRawBindingValue = string | number | boolean | null | TRawBindingValue[];
