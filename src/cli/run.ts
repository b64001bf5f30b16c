/**
 * mediactl command line
 *
 * Parses arguments with commander, selects players from the bus and runs a
 * player command against them. Everything the process touches (output
 * streams, configuration, the bus) is injectable so the whole flow runs
 * in tests without a session bus.
 */

import { Command, CommanderError } from 'commander';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { formatCommandList, handlePlayerCommand, type CommandResult } from '../commands/index.js';
import { loadConfig, type MediactlConfig } from '../config/loader.js';
import { getRuntimePackageVersion } from '../lib/version.js';
import {
  parsePlayerList,
  saveSnapshot,
  selectPlayers,
  SnapshotPlayerBus,
  type MediaPlayer,
  type PlayerBus,
} from '../players/index.js';
import { debugLog } from '../utils/debug.js';

export interface CliOptions {
  player?: string;
  allPlayers?: boolean;
  ignorePlayer?: string;
  format?: string;
  listAll?: boolean;
  stateFile?: string;
}

/** A bus plus whatever has to happen once the command is done with it */
export interface BusSession {
  bus: PlayerBus;
  close(): Promise<void>;
}

export interface CliIo {
  writeOut(text: string): void;
  writeErr(text: string): void;
  /** Defaults to chalk's own terminal detection */
  color?: boolean;
  config?: MediactlConfig;
  openSession?: (stateFile: string) => Promise<BusSession>;
}

const defaultIo: CliIo = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

const NO_PLAYERS = 'No players were found';

/**
 * Load the snapshot bus and write it back on close when a command changed it.
 */
export async function openSnapshotSession(stateFile: string): Promise<BusSession> {
  const bus = await SnapshotPlayerBus.fromFile(stateFile);
  return {
    bus,
    close: async () => {
      if (bus.isDirty()) {
        debugLog('cli', `Saving player snapshot ${stateFile}`);
        await saveSnapshot(stateFile, bus.toJSON());
      }
    },
  };
}

export function createProgram(version: string): Command {
  return new Command()
    .name('mediactl')
    .description('Controller for media players')
    .summary('For players supporting the MPRIS D-Bus specification')
    .version(`v${version}`, '-v, --version', 'Print version information')
    .option('-p, --player <names>', 'A comma separated list of names of players to control (default: the first available player)')
    .option('-a, --all-players', 'Select all available players to be controlled')
    .option('-i, --ignore-player <names>', 'A comma separated list of names of players to ignore')
    .option('-f, --format <format>', 'A format string for printing properties and metadata')
    .option('-l, --list-all', 'List the names of running players that can be controlled')
    .option('-s, --state-file <path>', 'Player snapshot file to control')
    .argument('[command...]', 'The command to run, followed by its arguments')
    .addHelpText('after', `\n${formatCommandList()}\n\nFormat strings expand {{ key }} and {{ fn(key) }} with fn one of lc, uc, duration:\n  $ mediactl metadata --format '{{ artist }} - {{ title }} ({{ duration(mpris:length) }})'`);
}

interface DispatchContext {
  io: CliIo;
  colors: ChalkInstance;
  config: MediactlConfig;
}

async function listAll(bus: PlayerBus, { io, colors }: DispatchContext): Promise<number> {
  const names = await bus.listPlayers();
  if (names.length === 0) {
    io.writeErr(colors.yellow(NO_PLAYERS) + '\n');
    return 0;
  }
  for (const name of names) {
    io.writeOut(name + '\n');
  }
  return 0;
}

async function runOnPlayers(
  bus: PlayerBus,
  commandLine: string[],
  options: CliOptions,
  { io, colors, config }: DispatchContext,
): Promise<number> {
  const available = await bus.listPlayers();
  if (available.length === 0) {
    io.writeErr(colors.yellow(NO_PLAYERS) + '\n');
    return 0;
  }

  const requested = parsePlayerList(options.player) ?? available;
  const ignored = parsePlayerList(options.ignorePlayer) ?? config.ignorePlayers;
  const selected = selectPlayers(requested, available, ignored);
  if (selected.length === 0) {
    io.writeErr(colors.yellow(NO_PLAYERS) + '\n');
    return 0;
  }
  debugLog('cli', `Selected players: ${selected.join(', ')}`);

  for (const name of selected) {
    let player: MediaPlayer;
    try {
      player = await bus.connect(name);
    } catch (err) {
      io.writeErr(colors.red(`Connection to player failed: ${errorMessage(err)}`) + '\n');
      return 1;
    }

    let result: CommandResult;
    try {
      result = await handlePlayerCommand(player, commandLine, { format: options.format });
    } catch (err) {
      io.writeErr(colors.red(`Could not execute command: ${errorMessage(err)}`) + '\n');
      return 1;
    }

    for (const line of result.lines) {
      io.writeOut(line + '\n');
    }

    if (result.handled && !options.allPlayers) {
      break;
    }
  }

  return 0;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run the CLI for `argv` (without the node and script paths) and return
 * the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  const colors = io.color === undefined ? chalk : new Chalk({ level: io.color ? 1 : 0 });
  const program = createProgram(getRuntimePackageVersion())
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.writeOut(text),
      writeErr: (text) => io.writeErr(text),
    });

  let exitCode = 0;

  program.action(async (commandLine: string[], options: CliOptions) => {
    const config = io.config ?? loadConfig();
    const context: DispatchContext = { io, colors, config };

    if (!options.listAll && commandLine.length === 0) {
      io.writeErr(colors.red('No command entered') + '\n\n');
      program.outputHelp({ error: true });
      exitCode = 0;
      return;
    }

    const stateFile = options.stateFile ?? config.stateFile;
    const session = await (io.openSession ?? openSnapshotSession)(stateFile);
    try {
      exitCode = options.listAll
        ? await listAll(session.bus, context)
        : await runOnPlayers(session.bus, commandLine, options, context);
    } finally {
      await session.close();
    }
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    io.writeErr(colors.red(errorMessage(err)) + '\n');
    return 1;
  }

  return exitCode;
}
