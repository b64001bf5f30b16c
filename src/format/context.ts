/**
 * Render contexts for the player commands.
 *
 * One context is built per command and per player, then discarded.
 */

import { createContext, float64Value, int64Value, stringValue } from './values.js';
import type { Context, ContextValue } from './types.js';

/** Short names filled in from the xesam namespace when the player omits them */
export const METADATA_ALIASES: ReadonlyArray<readonly [alias: string, source: string]> = [
  ['artist', 'xesam:artist'],
  ['album', 'xesam:album'],
  ['title', 'xesam:title'],
];

export function statusContext(status: string): Context {
  return createContext([['status', stringValue(status)]]);
}

export function positionContext(microseconds: bigint): Context {
  return createContext([['position', int64Value(microseconds)]]);
}

export function volumeContext(level: number): Context {
  return createContext([['volume', float64Value(level)]]);
}

export function metadataContext(metadata: Iterable<readonly [string, ContextValue]>): Context {
  const context = createContext(metadata);

  for (const [alias, source] of METADATA_ALIASES) {
    const value = context.get(source);
    if (!context.has(alias) && value !== undefined) {
      context.set(alias, value);
    }
  }

  return context;
}
