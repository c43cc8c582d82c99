import type { AssertOperator, VariableValue } from '@courier/catalog';
import { stringify } from '../templates/template-resolver.js';

/** Narrow an arbitrary decoded value into the variable value variant. */
export function toVariableValue(value: unknown): VariableValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (Array.isArray(value)) return value.map((item: unknown) => toVariableValue(item));
  if (typeof value === 'object') {
    const out: Record<string, VariableValue> = {};
    for (const [key, item] of Object.entries(value)) out[key] = toVariableValue(item);
    return out;
  }
  return String(value);
}

export function parseJsonBody(text: string): VariableValue | undefined {
  if (text.trim() === '') return undefined;
  try {
    return toVariableValue(JSON.parse(text));
  } catch {
    return undefined;
  }
}

/** Number form of a value, when it has an unambiguous one. */
export function toNumber(value: VariableValue): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

function kindOf(value: VariableValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function deepEqual(a: VariableValue, b: VariableValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }
  if (a !== null && b !== null && typeof a === 'object' && typeof b === 'object' && !Array.isArray(a) && !Array.isArray(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => key in b && deepEqual(a[key], b[key]));
  }
  return false;
}

/**
 * Value-typed equality: same kinds compare directly, mixed kinds compare as
 * numbers when both are numeric and as text otherwise.
 */
export function valuesEqual(actual: VariableValue, expected: VariableValue): boolean {
  if (kindOf(actual) === kindOf(expected)) return deepEqual(actual, expected);

  const a = toNumber(actual);
  const e = toNumber(expected);
  if (a !== undefined && e !== undefined) return a === e;

  return stringify(actual) === stringify(expected);
}

export interface Comparison {
  passed: boolean;
  reason?: string;
}

export function compare(actual: VariableValue, operator: AssertOperator, expected: VariableValue): Comparison {
  switch (operator) {
    case '==':
      return { passed: valuesEqual(actual, expected) };

    case '!=':
      return { passed: !valuesEqual(actual, expected) };

    case '>':
    case '<': {
      const a = toNumber(actual);
      const e = toNumber(expected);
      if (a === undefined || e === undefined) {
        return {
          passed: false,
          reason: `type mismatch: ${operator} needs numbers, got ${kindOf(actual)} and ${kindOf(expected)}`,
        };
      }
      return { passed: operator === '>' ? a > e : a < e };
    }

    case 'contains':
    case '!contains': {
      let contained: boolean;
      if (typeof actual === 'string') {
        contained = actual.includes(stringify(expected));
      } else if (Array.isArray(actual)) {
        contained = actual.some((item) => valuesEqual(item, expected));
      } else {
        return {
          passed: false,
          reason: `type mismatch: ${operator} needs a string or a list, got ${kindOf(actual)}`,
        };
      }
      return { passed: operator === 'contains' ? contained : !contained };
    }
  }
}
