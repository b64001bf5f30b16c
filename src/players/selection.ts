/**
 * Player selection for --player / --ignore-player.
 *
 * A requested name matches a running player either exactly or as one of its
 * instances (`vlc` matches `vlc.instance1234`).
 */

const INSTANCE_SEPARATOR = '.instance';

/**
 * Split a comma separated player list.
 * Returns undefined when no list was given so callers can fall back to "all".
 */
export function parsePlayerList(arg: string | undefined): string[] | undefined {
  if (arg === undefined) return undefined;
  return arg
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export function playerNameMatches(name: string, instance: string): boolean {
  if (name === instance) return true;
  return instance.startsWith(name) && instance.slice(name.length).startsWith(INSTANCE_SEPARATOR);
}

/**
 * Resolve requested names against the running players.
 * Order follows the request list; ignored players and duplicates are dropped.
 */
export function selectPlayers(
  requested: readonly string[],
  available: readonly string[],
  ignored: readonly string[] = [],
): string[] {
  const selected: string[] = [];

  for (const name of requested) {
    for (const candidate of available) {
      if (!playerNameMatches(name, candidate)) continue;
      if (ignored.some((ignoredName) => playerNameMatches(ignoredName, candidate))) continue;
      if (!selected.includes(candidate)) {
        selected.push(candidate);
      }
    }
  }

  return selected;
}
