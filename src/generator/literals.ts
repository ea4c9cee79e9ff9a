/**
 * Python literal formatting for node bindings.
 *
 * One formatter per binding variant. Top-level strings get the lenient
 * treatment (keywords, numbers and bracketed literals pass through unquoted);
 * strings inside a sequence are always data and always quoted.
 */

import { PYTHON_KEYWORD_LITERALS } from '../constants.js';
import type { TBindingValue } from '../manifest/types.js';
import { ScriptGenerationError } from './errors.js';
import { isValidPythonIdentifier, toPythonStringLiteral } from './code-utils.js';

const DECIMAL_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// Python 3 rejects integer literals like `007`; floats such as `007.5` are fine
const LEADING_ZERO_INTEGER = /^[+-]?0+[1-9]\d*$/;

const BRACKET_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
];

/**
 * Text Python reads as a number literal, so it can be emitted unquoted.
 */
export function isDecimalNumberText(value: string): boolean {
  return DECIMAL_NUMBER.test(value) && !LEADING_ZERO_INTEGER.test(value);
}

function isPreformattedLiteral(value: string): boolean {
  return value.length >= 2 && BRACKET_PAIRS.some(([open, close]) => value.startsWith(open) && value.endsWith(close));
}

function isKeywordLiteral(value: string): boolean {
  return (PYTHON_KEYWORD_LITERALS as readonly string[]).includes(value);
}

/**
 * Integral values print as integers (`100.0` → `100`); fractional values as
 * fixed six-decimal floats (`0.25` → `0.250000`). Values that six decimals
 * would flatten to zero keep their exponent form.
 */
export function formatNumberLiteral(value: number): string {
  if (Number.isNaN(value)) return "float('nan')";
  if (!Number.isFinite(value)) return value > 0 ? "float('inf')" : "float('-inf')";
  if (Number.isInteger(value)) return String(value);
  const fixed = value.toFixed(6);
  return Number(fixed) === 0 ? String(value) : fixed;
}

/**
 * Format a top-level string binding. Returns null for the empty string,
 * which drops the binding from the call.
 */
export function formatStringLiteral(value: string): string | null {
  if (value === '') return null;
  if (isKeywordLiteral(value)) return value;
  if (isDecimalNumberText(value)) return value;
  if (isPreformattedLiteral(value)) return value;
  return toPythonStringLiteral(value);
}

function formatSequenceItem(item: TBindingValue): string {
  switch (item.kind) {
    case 'string':
      return toPythonStringLiteral(item.value);
    case 'number':
      return formatNumberLiteral(item.value);
    case 'bool':
      return item.value ? 'True' : 'False';
    case 'null':
      return 'None';
    case 'sequence':
      return formatSequenceLiteral(item.items);
  }
}

export function formatSequenceLiteral(items: TBindingValue[]): string {
  return `[${items.map(formatSequenceItem).join(', ')}]`;
}

/**
 * Format one binding value as a Python expression, or null when the binding
 * should be left out of the call entirely.
 */
export function formatBindingLiteral(value: TBindingValue): string | null {
  switch (value.kind) {
    case 'string':
      return formatStringLiteral(value.value);
    case 'number':
      return formatNumberLiteral(value.value);
    case 'bool':
      return value.value ? 'True' : 'False';
    case 'null':
      return 'None';
    case 'sequence':
      return formatSequenceLiteral(value.items);
  }
}

export type TSerializeBindingsOptions = {
  /** Parameter names to leave out (e.g. ones passed positionally) */
  exclude?: readonly string[];
  /** Node id reported when a binding name is rejected */
  nodeId?: string;
};

/**
 * Render bindings as `name=literal` keyword arguments joined by `", "`.
 *
 * Parameters are sorted by name so the same node always renders the same
 * text. Returns an empty string when nothing is left to pass.
 */
export function serializeBindings(
  bindings: Record<string, TBindingValue>,
  options: TSerializeBindingsOptions = {}
): string {
  const exclude = new Set(options.exclude ?? []);
  const parts: string[] = [];

  for (const name of Object.keys(bindings).sort()) {
    if (exclude.has(name)) continue;
    if (!isValidPythonIdentifier(name)) {
      throw new ScriptGenerationError(
        'INVALID_BINDING_NAME',
        `Binding "${name}"${options.nodeId ? ` on node "${options.nodeId}"` : ''} is not a valid Python keyword argument name`,
        options.nodeId
      );
    }
    const literal = formatBindingLiteral(bindings[name]);
    if (literal === null) continue;
    parts.push(`${name}=${literal}`);
  }

  return parts.join(', ');
}
