import type { MediaPlayer } from '../players/index.js';

export interface CommandOptions {
  /** Value of --format, if given */
  format?: string;
}

export interface CommandResult {
  /**
   * False when the player could not act on the command (missing capability,
   * no current track). The dispatcher then moves on to the next player.
   */
  handled: boolean;
  /** Lines to print on stdout */
  lines: string[];
}

export type PlayerCommand = (
  player: MediaPlayer,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

export interface PlayerCommandInfo {
  name: string;
  usage: string;
  description: string;
  run: PlayerCommand;
}

export class CommandError extends Error {
  constructor(
    message: string,
    public readonly command?: string,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

export const FORMAT_NOT_SUPPORTED = 'format strings are not supported on command functions.';

export function handled(lines: string[] = []): CommandResult {
  return { handled: true, lines };
}

export function skipped(): CommandResult {
  return { handled: false, lines: [] };
}

/** Control commands produce no output, so a format string is a usage error */
export function rejectFormat(command: string, options: CommandOptions): void {
  if (options.format !== undefined) {
    throw new CommandError(FORMAT_NOT_SUPPORTED, command);
  }
}
