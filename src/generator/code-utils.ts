import type { TPipelineNode } from '../manifest/types.js';
import { ScriptGenerationError } from './errors.js';

const PYTHON_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const PYTHON_RESERVED_WORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
  'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'finally',
  'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal',
  'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

/**
 * Check that a name can be used as a Python function or keyword-argument name.
 */
export function isValidPythonIdentifier(name: string): boolean {
  return PYTHON_IDENTIFIER.test(name) && !PYTHON_RESERVED_WORDS.has(name);
}

/**
 * Derive a callable name from a display name: lowercase, spaces to underscores.
 *
 * @example slugifyDisplayName('Train Test Split') // 'train_test_split'
 */
export function slugifyDisplayName(displayName: string): string {
  return displayName.trim().toLowerCase().replace(/ /g, '_');
}

/**
 * Resolve the name a node is invoked by in the generated script.
 *
 * Uses `codeIdentifier` when set, otherwise the slugified display name.
 * Throws when neither yields a usable Python identifier.
 */
export function resolveCallableName(node: TPipelineNode): string {
  const explicit = node.codeIdentifier?.trim() ?? '';
  const name = explicit !== '' ? explicit : slugifyDisplayName(node.displayName);

  if (name === '') {
    throw new ScriptGenerationError(
      'MISSING_CALLABLE_NAME',
      `Node "${node.identifier}" has neither a code identifier nor a display name`,
      node.identifier
    );
  }
  if (!isValidPythonIdentifier(name)) {
    throw new ScriptGenerationError(
      'INVALID_CALLABLE_NAME',
      `Node "${node.identifier}" resolves to "${name}", which is not a valid Python function name`,
      node.identifier
    );
  }
  return name;
}

/**
 * Single-quoted Python string literal.
 */
export function toPythonStringLiteral(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `'${escaped}'`;
}

/**
 * Literal text safe to place inside a double-quoted Python f-string.
 */
export function toFStringText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r\n|\r|\n/g, ' ')
    .replace(/\{/g, '{{')
    .replace(/\}/g, '}}');
}

/**
 * Single-line text safe to place inside a triple-quoted docstring.
 */
export function toDocstringText(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\r\n|\r|\n/g, ' ');
}

/**
 * Prefix every non-empty line with the given indent.
 */
export function indentLines(lines: string[], indent: string): string[] {
  return lines.map((line) => (line === '' ? '' : indent + line));
}
