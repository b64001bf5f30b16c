import { expandFormat, formatValue, metadataContext } from '../format/index.js';
import { handled, skipped, type PlayerCommand } from './types.js';

/**
 * metadata [KEY...]
 *
 * --format renders against the metadata plus the artist/album/title aliases.
 * Keys print one value per line; keys the track does not have print nothing.
 * With neither, every entry prints as `key<TAB>value`.
 */
export const metadata: PlayerCommand = async (player, args, options) => {
  // no current track
  if (!player.canPlay) {
    return skipped();
  }

  const raw = await player.getMetadata();

  if (options.format !== undefined) {
    return handled([expandFormat(options.format, metadataContext(raw))]);
  }

  if (args.length === 0) {
    return handled([...raw].map(([key, value]) => `${key}\t${formatValue(value)}`));
  }

  const context = metadataContext(raw);
  const lines: string[] = [];
  for (const key of args) {
    const value = context.get(key);
    if (value !== undefined) {
      lines.push(formatValue(value));
    }
  }
  return handled(lines);
};
