/**
 * Playback control commands: play, pause, play-pause, stop, next, previous, open.
 */

import { isAbsolute, resolve } from 'path';
import { pathToFileURL } from 'url';
import type { MediaPlayer, PlayerCapabilities } from '../players/index.js';
import { handled, rejectFormat, skipped, type PlayerCommand } from './types.js';

/**
 * Build a control command that only runs when the player advertises the
 * given capability. There is no CanStop in MPRIS, so stop and play-pause
 * gate on CanPlay (a current track exists).
 */
function controlCommand(
  name: string,
  capability: keyof PlayerCapabilities,
  action: (player: MediaPlayer) => Promise<void>,
): PlayerCommand {
  return async (player, _args, options) => {
    rejectFormat(name, options);
    if (!player[capability]) {
      return skipped();
    }
    await action(player);
    return handled();
  };
}

export const play = controlCommand('play', 'canPlay', (player) => player.play());
export const pause = controlCommand('pause', 'canPause', (player) => player.pause());
export const playPause = controlCommand('play-pause', 'canPlay', (player) => player.playPause());
export const stop = controlCommand('stop', 'canPlay', (player) => player.stop());
export const next = controlCommand('next', 'canGoNext', (player) => player.next());
export const previous = controlCommand('previous', 'canGoPrevious', (player) => player.previous());

const URI_SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

/**
 * Accept either a URI or a local path; paths are resolved against the
 * working directory and turned into file:// URIs.
 */
export function toPlayerUri(arg: string, cwd: string = process.cwd()): string {
  if (URI_SCHEME.test(arg)) {
    return arg;
  }
  const absolute = isAbsolute(arg) ? arg : resolve(cwd, arg);
  return pathToFileURL(absolute).href;
}

export const open: PlayerCommand = async (player, args, options) => {
  rejectFormat('open', options);
  const [uri] = args;
  if (uri !== undefined) {
    await player.open(toPlayerUri(uri));
  }
  return handled();
};
