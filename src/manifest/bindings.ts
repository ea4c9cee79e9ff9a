import type { TBindingValue, TRawBindingValue } from './types.js';

/**
 * Constructors for tagged binding values.
 */
export const binding = {
  string: (value: string): TBindingValue => ({ kind: 'string', value }),
  number: (value: number): TBindingValue => ({ kind: 'number', value }),
  bool: (value: boolean): TBindingValue => ({ kind: 'bool', value }),
  sequence: (items: TBindingValue[]): TBindingValue => ({ kind: 'sequence', items }),
  null: (): TBindingValue => ({ kind: 'null' }),
};

/**
 * Tag a JSON binding value.
 */
export function toBindingValue(raw: TRawBindingValue): TBindingValue {
  if (raw === null) return binding.null();
  if (Array.isArray(raw)) return binding.sequence(raw.map(toBindingValue));
  if (typeof raw === 'string') return binding.string(raw);
  if (typeof raw === 'number') return binding.number(raw);
  return binding.bool(raw);
}

/**
 * Tag every value of a JSON bindings map.
 */
export function toBindingMap(raw: Record<string, TRawBindingValue>): Record<string, TBindingValue> {
  const result: Record<string, TBindingValue> = {};
  for (const [name, value] of Object.entries(raw)) {
    result[name] = toBindingValue(value);
  }
  return result;
}
