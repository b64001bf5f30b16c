/**
 * Built-in template helpers, callable as `{{ name(variable) }}`.
 *
 * The table is fixed at module load; there is no registration API.
 */

import { formatValue } from './values.js';
import type { ContextValue, Helper } from './types.js';

const MICROSECONDS_PER_SECOND = 1_000_000n;

function lowercase(value: ContextValue): string {
  return formatValue(value).toLocaleLowerCase();
}

function uppercase(value: ContextValue): string {
  return formatValue(value).toLocaleUpperCase();
}

/** `M:SS`, or `H:MM:SS` from one hour up. Only int64 microseconds qualify. */
function duration(value: ContextValue): string | undefined {
  if (value.kind !== 'int64') {
    return undefined;
  }

  const totalSeconds = value.value / MICROSECONDS_PER_SECOND;
  const seconds = totalSeconds % 60n;
  const minutes = (totalSeconds / 60n) % 60n;
  const hours = totalSeconds / 3600n;

  const pad = (n: bigint): string => n.toString().padStart(2, '0');

  if (hours !== 0n) {
    return `${hours}:${pad(minutes)}:${pad(seconds)}`;
  }
  return `${minutes}:${pad(seconds)}`;
}

export const HELPERS: ReadonlyMap<string, Helper> = new Map<string, Helper>([
  ['lc', lowercase],
  ['uc', uppercase],
  ['duration', duration],
]);

export function getHelper(name: string): Helper | undefined {
  return HELPERS.get(name);
}
