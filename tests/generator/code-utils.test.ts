/**
 * Tests for callable naming and Python text escaping
 */

import {
  indentLines,
  isValidPythonIdentifier,
  resolveCallableName,
  slugifyDisplayName,
  toDocstringText,
  toFStringText,
  toPythonStringLiteral,
} from '../../src/generator/code-utils.js';
import { ScriptGenerationError } from '../../src/generator/errors.js';
import { createNode } from '../helpers/pipeline-fixtures.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof ScriptGenerationError ? error.code : 'not-a-generation-error';
  }
  return undefined;
}

describe('slugifyDisplayName', () => {
  it('should lowercase and replace spaces with underscores', () => {
    expect(slugifyDisplayName('Train Test Split')).toBe('train_test_split');
  });

  it('should trim surrounding whitespace first', () => {
    expect(slugifyDisplayName('  Scale Features ')).toBe('scale_features');
  });
});

describe('isValidPythonIdentifier', () => {
  it('should accept identifiers', () => {
    expect(isValidPythonIdentifier('train_model')).toBe(true);
    expect(isValidPythonIdentifier('_private2')).toBe(true);
  });

  it('should reject malformed names and reserved words', () => {
    expect(isValidPythonIdentifier('2fast')).toBe(false);
    expect(isValidPythonIdentifier('scale-features')).toBe(false);
    expect(isValidPythonIdentifier('')).toBe(false);
    expect(isValidPythonIdentifier('lambda')).toBe(false);
    expect(isValidPythonIdentifier('None')).toBe(false);
  });
});

describe('resolveCallableName', () => {
  it('should prefer the code identifier', () => {
    const node = createNode({ displayName: 'Scale Features', codeIdentifier: 'min_max_scale' });
    expect(resolveCallableName(node)).toBe('min_max_scale');
  });

  it('should derive the name from the display name when no identifier is set', () => {
    expect(resolveCallableName(createNode({ displayName: 'Train Test Split' }))).toBe('train_test_split');
  });

  it('should treat a blank code identifier as absent', () => {
    expect(resolveCallableName(createNode({ displayName: 'Drop Nulls', codeIdentifier: '  ' }))).toBe('drop_nulls');
  });

  it('should fail when neither name is usable', () => {
    expect(codeOf(() => resolveCallableName(createNode({ displayName: '   ' })))).toBe('MISSING_CALLABLE_NAME');
  });

  it('should fail when the resolved name is not a Python identifier', () => {
    const node = createNode({ identifier: 'n4', displayName: 'Scale-Features (v2)' });
    expect(() => resolveCallableName(node)).toThrow(
      'Node "n4" resolves to "scale-features_(v2)", which is not a valid Python function name'
    );
    expect(codeOf(() => resolveCallableName(node))).toBe('INVALID_CALLABLE_NAME');
  });
});

describe('toPythonStringLiteral', () => {
  it('should single-quote and escape', () => {
    expect(toPythonStringLiteral('plain')).toBe("'plain'");
    expect(toPythonStringLiteral("O'Brien")).toBe("'O\\'Brien'");
    expect(toPythonStringLiteral('line1\r\nline2')).toBe("'line1\\r\\nline2'");
  });
});

describe('toFStringText', () => {
  it('should double braces and escape double quotes', () => {
    expect(toFStringText('Scale {x} "fast"')).toBe('Scale {{x}} \\"fast\\"');
  });

  it('should flatten newlines to spaces', () => {
    expect(toFStringText('two\nlines')).toBe('two lines');
    expect(toFStringText('a\r\nb\rc')).toBe('a b c');
  });
});

describe('toDocstringText', () => {
  it('should escape quotes and flatten every line break', () => {
    expect(toDocstringText('v"1\r2\r\n3\n4')).toBe('v\\"1 2 3 4');
  });
});

describe('indentLines', () => {
  it('should indent non-empty lines only', () => {
    expect(indentLines(['a', '', 'b'], '  ')).toEqual(['  a', '', '  b']);
  });
});
