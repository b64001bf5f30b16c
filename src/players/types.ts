/**
 * Media player boundary.
 *
 * The CLI only talks to players through these interfaces; the transport
 * behind them (MPRIS over D-Bus, or the JSON snapshot in ./snapshot-bus.ts)
 * is interchangeable.
 */

import type { ContextValue } from '../format/index.js';

export type PlaybackStatus = 'Playing' | 'Paused' | 'Stopped';

export interface PlayerCapabilities {
  canPlay: boolean;
  canPause: boolean;
  canGoNext: boolean;
  canGoPrevious: boolean;
  canSeek: boolean;
  canControl: boolean;
}

export interface MediaPlayer extends Readonly<PlayerCapabilities> {
  readonly name: string;

  getStatus(): Promise<PlaybackStatus | undefined>;
  /** Microseconds */
  getPosition(): Promise<bigint>;
  getVolume(): Promise<number>;
  getMetadata(): Promise<ReadonlyMap<string, ContextValue>>;

  play(): Promise<void>;
  pause(): Promise<void>;
  playPause(): Promise<void>;
  stop(): Promise<void>;
  next(): Promise<void>;
  previous(): Promise<void>;
  /** Relative, in microseconds */
  seek(offset: bigint): Promise<void>;
  setPosition(position: bigint): Promise<void>;
  setVolume(level: number): Promise<void>;
  open(uri: string): Promise<void>;
}

export interface PlayerBus {
  /** Names of the players currently reachable, in discovery order */
  listPlayers(): Promise<string[]>;
  connect(name: string): Promise<MediaPlayer>;
}
