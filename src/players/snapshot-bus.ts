/**
 * Snapshot Player Bus
 *
 * A PlayerBus backed by a JSON document instead of a live session bus.
 * Each entry describes one player: playback status, position, volume,
 * capabilities and its metadata map.
 *
 * Data layout (players.json):
 *   { "players": [ { "name": "spotify", "status": "Playing",
 *                    "position": 1500000, "volume": 0.8,
 *                    "metadata": { "xesam:title": "...", "mpris:length": 215000000 } } ] }
 *
 * Control operations mutate the loaded document; `isDirty()` tells the caller
 * whether it needs to be written back with saveSnapshot().
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { z } from 'zod';
import { atomicWriteJson } from '../lib/atomic-write.js';
import { float64Value, int64Value, stringListValue, stringValue, type ContextValue } from '../format/index.js';
import type { MediaPlayer, PlaybackStatus, PlayerBus } from './types.js';

// ============================================================================
// Schema
// ============================================================================

const MetadataValueSchema = z.union([z.string(), z.array(z.string()), z.number()]);

const PlayerSnapshotSchema = z.object({
  name: z.string().min(1),
  status: z.enum(['Playing', 'Paused', 'Stopped']).optional(),
  position: z.number().int().nonnegative().default(0),
  volume: z.number().nonnegative().default(1),
  canPlay: z.boolean().default(true),
  canPause: z.boolean().default(true),
  canGoNext: z.boolean().default(true),
  canGoPrevious: z.boolean().default(true),
  canSeek: z.boolean().default(true),
  canControl: z.boolean().default(true),
  metadata: z.record(MetadataValueSchema).default({}),
});

const SnapshotFileSchema = z.object({
  players: z.array(PlayerSnapshotSchema).default([]),
});

export type PlayerSnapshot = z.infer<typeof PlayerSnapshotSchema>;
export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;
export type MetadataJsonValue = z.infer<typeof MetadataValueSchema>;

export class SnapshotError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'SnapshotError';
  }
}

// ============================================================================
// File access
// ============================================================================

export function parseSnapshot(data: unknown, path?: string): SnapshotFile {
  const result = SnapshotFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new SnapshotError(`Invalid player snapshot${where}: ${issue?.message ?? 'unknown error'}`, path);
  }
  return result.data;
}

/** A missing file is an empty bus, not an error */
export async function loadSnapshot(path: string): Promise<SnapshotFile> {
  if (!existsSync(path)) return { players: [] };

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new SnapshotError(
      `Could not read player snapshot ${path}: ${err instanceof Error ? err.message : String(err)}`,
      path,
    );
  }
  return parseSnapshot(raw, path);
}

export async function saveSnapshot(path: string, snapshot: SnapshotFile): Promise<void> {
  await atomicWriteJson(path, snapshot);
}

// ============================================================================
// Metadata conversion
// ============================================================================

/** JSON numbers become int64 when integral, float64 otherwise */
export function toContextValue(value: MetadataJsonValue): ContextValue {
  if (typeof value === 'string') return stringValue(value);
  if (Array.isArray(value)) return stringListValue(value);
  return Number.isInteger(value) ? int64Value(BigInt(value)) : float64Value(value);
}

function trackLength(snapshot: PlayerSnapshot): number | undefined {
  const length = snapshot.metadata['mpris:length'];
  return typeof length === 'number' && Number.isInteger(length) ? length : undefined;
}

// ============================================================================
// Player
// ============================================================================

class SnapshotPlayer implements MediaPlayer {
  constructor(
    private readonly state: PlayerSnapshot,
    private readonly onChange: () => void,
  ) {}

  get name(): string { return this.state.name; }
  get canPlay(): boolean { return this.state.canPlay; }
  get canPause(): boolean { return this.state.canPause; }
  get canGoNext(): boolean { return this.state.canGoNext; }
  get canGoPrevious(): boolean { return this.state.canGoPrevious; }
  get canSeek(): boolean { return this.state.canSeek; }
  get canControl(): boolean { return this.state.canControl; }

  async getStatus(): Promise<PlaybackStatus | undefined> {
    return this.state.status;
  }

  async getPosition(): Promise<bigint> {
    return BigInt(this.state.position);
  }

  async getVolume(): Promise<number> {
    return this.state.volume;
  }

  async getMetadata(): Promise<ReadonlyMap<string, ContextValue>> {
    return new Map(
      Object.entries(this.state.metadata).map(([key, value]): [string, ContextValue] => [key, toContextValue(value)]),
    );
  }

  async play(): Promise<void> {
    this.setStatus('Playing');
  }

  async pause(): Promise<void> {
    this.setStatus('Paused');
  }

  async playPause(): Promise<void> {
    this.setStatus(this.state.status === 'Playing' ? 'Paused' : 'Playing');
  }

  async stop(): Promise<void> {
    this.state.position = 0;
    this.setStatus('Stopped');
  }

  async next(): Promise<void> {
    this.movePosition(0n);
  }

  async previous(): Promise<void> {
    this.movePosition(0n);
  }

  async seek(offset: bigint): Promise<void> {
    this.movePosition(BigInt(this.state.position) + offset);
  }

  async setPosition(position: bigint): Promise<void> {
    this.movePosition(position);
  }

  async setVolume(level: number): Promise<void> {
    this.state.volume = Math.max(0, level);
    this.onChange();
  }

  async open(uri: string): Promise<void> {
    this.state.metadata = { 'xesam:url': uri };
    this.state.position = 0;
    this.setStatus('Playing');
  }

  private setStatus(status: PlaybackStatus): void {
    this.state.status = status;
    this.onChange();
  }

  /** Clamped to [0, mpris:length] when the track length is known */
  private movePosition(position: bigint): void {
    let clamped = position < 0n ? 0n : position;
    const length = trackLength(this.state);
    if (length !== undefined && clamped > BigInt(length)) {
      clamped = BigInt(length);
    }
    this.state.position = Number(clamped);
    this.onChange();
  }
}

// ============================================================================
// Bus
// ============================================================================

export class SnapshotPlayerBus implements PlayerBus {
  private dirty = false;

  constructor(private readonly snapshot: SnapshotFile) {}

  static async fromFile(path: string): Promise<SnapshotPlayerBus> {
    return new SnapshotPlayerBus(await loadSnapshot(path));
  }

  async listPlayers(): Promise<string[]> {
    return this.snapshot.players.map((player) => player.name);
  }

  async connect(name: string): Promise<MediaPlayer> {
    const state = this.snapshot.players.find((player) => player.name === name);
    if (!state) {
      throw new SnapshotError(`no player named "${name}"`);
    }
    return new SnapshotPlayer(state, () => {
      this.dirty = true;
    });
  }

  isDirty(): boolean {
    return this.dirty;
  }

  toJSON(): SnapshotFile {
    return this.snapshot;
  }
}
