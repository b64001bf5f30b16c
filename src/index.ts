/**
 * mediactl
 * Media player controller and its {{ template }} format language.
 */

// Format language
export {
  tokenize,
  render,
  expandFormat,
  formatValue,
  createContext,
  stringValue,
  stringListValue,
  int64Value,
  float64Value,
  statusContext,
  positionContext,
  volumeContext,
  metadataContext,
  HELPERS,
  FormatError,
  FORMAT_ERROR_PREFIX,
  MAX_FORMAT_LENGTH,
} from './format/index.js';
export type { Token, Context, ContextValue, Helper, FormatErrorKind } from './format/index.js';

// Players
export {
  parsePlayerList,
  playerNameMatches,
  selectPlayers,
  SnapshotPlayerBus,
  SnapshotError,
  loadSnapshot,
  saveSnapshot,
} from './players/index.js';
export type { MediaPlayer, PlayerBus, PlaybackStatus, PlayerCapabilities } from './players/index.js';

// Commands
export { PLAYER_COMMANDS, handlePlayerCommand, CommandError } from './commands/index.js';
export type { CommandOptions, CommandResult } from './commands/index.js';

// Configuration
export { loadConfig, type MediactlConfig } from './config/loader.js';

// CLI
export { runCli, type CliIo, type BusSession } from './cli/run.js';
