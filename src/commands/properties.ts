/**
 * Property commands: position, volume, status.
 *
 * Without an argument they print the current value, through --format when
 * given. With an argument position and volume set the value; a trailing
 * `+` or `-` makes the change relative.
 */

import { createContext, expandFormat, positionContext, statusContext, volumeContext } from '../format/index.js';
import { CommandError, handled, rejectFormat, skipped, type PlayerCommand } from './types.js';

const MICROSECONDS_PER_SECOND = 1_000_000;

interface ParsedAmount {
  amount: number;
  relative: boolean;
}

/**
 * Parse the leading number of `10`, `2.5+`, `0.1-`.
 * Anything after the number other than the direction suffix is ignored.
 */
export function parseAmount(arg: string, what: string): ParsedAmount {
  const value = Number.parseFloat(arg);
  if (!Number.isFinite(value)) {
    throw new CommandError(`Could not parse ${what} as a number: ${arg}`, what);
  }

  const suffix = arg.trimEnd().slice(-1);
  if (suffix === '+') return { amount: value, relative: true };
  if (suffix === '-') return { amount: -value, relative: true };
  return { amount: value, relative: false };
}

/** Seconds with six decimals, like printf("%f") */
function printSeconds(microseconds: bigint): string {
  return (Number(microseconds) / MICROSECONDS_PER_SECOND).toFixed(6);
}

export const position: PlayerCommand = async (player, args, options) => {
  const [arg] = args;

  if (arg !== undefined) {
    rejectFormat('position', options);
    const { amount, relative } = parseAmount(arg, 'position');
    if (!player.canSeek) {
      return skipped();
    }

    const offset = BigInt(Math.trunc(amount * MICROSECONDS_PER_SECOND));
    if (relative) {
      await player.seek(offset);
    } else {
      await player.setPosition(offset);
    }
    return handled();
  }

  const current = await player.getPosition();
  if (options.format !== undefined) {
    return handled([expandFormat(options.format, positionContext(current))]);
  }
  return handled([printSeconds(current)]);
};

export const volume: PlayerCommand = async (player, args, options) => {
  const [arg] = args;

  if (arg !== undefined) {
    rejectFormat('volume', options);
    const { amount, relative } = parseAmount(arg, 'volume');
    const level = relative ? (await player.getVolume()) + amount : amount;
    if (!player.canControl) {
      return skipped();
    }
    await player.setVolume(level);
    return handled();
  }

  const current = await player.getVolume();
  if (options.format !== undefined) {
    return handled([expandFormat(options.format, volumeContext(current))]);
  }
  return handled([current.toFixed(6)]);
};

export const status: PlayerCommand = async (player, _args, options) => {
  const state = await player.getStatus();

  if (options.format !== undefined) {
    // A player without a status renders the key as absent
    const context = state !== undefined ? statusContext(state) : createContext();
    return handled([expandFormat(options.format, context)]);
  }
  return handled([state ?? 'Not available']);
};
