/**
 * Player Command Table
 *
 * Maps command names to their handlers. The table is fixed; the CLI looks
 * commands up here and runs them once per selected player.
 */

import { next, open, pause, play, playPause, previous, stop } from './playback.js';
import { position, status, volume } from './properties.js';
import { metadata } from './metadata.js';
import { CommandError, type CommandOptions, type CommandResult, type PlayerCommandInfo } from './types.js';
import type { MediaPlayer } from '../players/index.js';

export const PLAYER_COMMANDS: readonly PlayerCommandInfo[] = [
  { name: 'play', usage: 'play', description: 'Command the player to play', run: play },
  { name: 'pause', usage: 'pause', description: 'Command the player to pause', run: pause },
  { name: 'play-pause', usage: 'play-pause', description: 'Command the player to toggle between play/pause', run: playPause },
  { name: 'stop', usage: 'stop', description: 'Command the player to stop', run: stop },
  { name: 'next', usage: 'next', description: 'Command the player to skip to the next track', run: next },
  { name: 'previous', usage: 'previous', description: 'Command the player to skip to the previous track', run: previous },
  {
    name: 'position',
    usage: 'position [OFFSET][+/-]',
    description: 'Command the player to go to the position or seek forward/backward OFFSET in seconds',
    run: position,
  },
  { name: 'volume', usage: 'volume [LEVEL][+/-]', description: 'Print or set the volume to LEVEL from 0.0 to 1.0', run: volume },
  { name: 'status', usage: 'status', description: 'Get the play status of the player', run: status },
  {
    name: 'metadata',
    usage: 'metadata [KEY...]',
    description: 'Print metadata for the current track. KEY may be artist, title, album, or any key found in the metadata',
    run: metadata,
  },
  { name: 'open', usage: 'open [URI]', description: 'Command the player to open the given URI (file path or remote URL)', run: open },
];

export function findPlayerCommand(name: string): PlayerCommandInfo | undefined {
  return PLAYER_COMMANDS.find((command) => command.name === name);
}

/**
 * Run `[name, ...args]` against one player.
 * An empty command line is not handled; an unknown name throws.
 */
export async function handlePlayerCommand(
  player: MediaPlayer,
  commandLine: readonly string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  const [name, ...args] = commandLine;
  if (name === undefined) {
    return { handled: false, lines: [] };
  }

  const command = findPlayerCommand(name);
  if (!command) {
    throw new CommandError(`Command not recognized: ${name}`, name);
  }
  return command.run(player, args, options);
}

/** Help text listing every command, aligned like commander's own output */
export function formatCommandList(): string {
  const width = Math.max(...PLAYER_COMMANDS.map((command) => command.usage.length)) + 2;
  const lines = PLAYER_COMMANDS.map((command) => `  ${command.usage.padEnd(width)}${command.description}`);
  return ['Available Commands:', ...lines].join('\n');
}

export { CommandError, FORMAT_NOT_SUPPORTED } from './types.js';
export type { CommandOptions, CommandResult, PlayerCommand, PlayerCommandInfo } from './types.js';
export { parseAmount } from './properties.js';
export { toPlayerUri } from './playback.js';
