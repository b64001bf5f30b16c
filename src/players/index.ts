export type { MediaPlayer, PlayerBus, PlaybackStatus, PlayerCapabilities } from './types.js';
export { parsePlayerList, playerNameMatches, selectPlayers } from './selection.js';
export {
  SnapshotPlayerBus,
  SnapshotError,
  loadSnapshot,
  saveSnapshot,
  parseSnapshot,
  toContextValue,
  type PlayerSnapshot,
  type SnapshotFile,
} from './snapshot-bus.js';
