import type { ContextValue, Float64Value, Int64Value, StringListValue, StringValue } from './types.js';

export function stringValue(value: string): StringValue {
  return { kind: 'string', value };
}

export function stringListValue(value: readonly string[]): StringListValue {
  return { kind: 'string-list', value: [...value] };
}

export function int64Value(value: bigint | number): Int64Value {
  return { kind: 'int64', value: typeof value === 'bigint' ? value : BigInt(Math.trunc(value)) };
}

export function float64Value(value: number): Float64Value {
  return { kind: 'float64', value };
}

/**
 * Print a double the way GVariant does: shortest round-trip digits, with
 * `.0` appended to whole numbers so they still read as floating point.
 */
function printFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  const printed = String(value);
  return /^-?\d+$/.test(printed) ? `${printed}.0` : printed;
}

/**
 * Default stringification of a context value.
 * Lists join with ", ", strings print verbatim, numbers in natural form.
 */
export function formatValue(value: ContextValue): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'string-list':
      return value.value.join(', ');
    case 'int64':
      return value.value.toString();
    case 'float64':
      return printFloat(value.value);
  }
}

export function createContext(entries: Iterable<readonly [string, ContextValue]> = []): Map<string, ContextValue> {
  return new Map<string, ContextValue>(entries);
}
