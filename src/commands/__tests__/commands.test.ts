/**
 * Tests for the player command table.
 *
 * Commands run against an in-memory SnapshotPlayerBus, so state changes can
 * be read back through the same MediaPlayer.
 */

import { describe, it, expect } from 'vitest';
import { join } from 'path';
import {
  CommandError,
  FORMAT_NOT_SUPPORTED,
  PLAYER_COMMANDS,
  formatCommandList,
  handlePlayerCommand,
  parseAmount,
  toPlayerUri,
} from '../index.js';
import { parseSnapshot, SnapshotPlayerBus } from '../../players/index.js';
import type { MediaPlayer } from '../../players/index.js';

async function playerWith(state: Record<string, unknown>): Promise<MediaPlayer> {
  const bus = new SnapshotPlayerBus(parseSnapshot({ players: [{ name: 'test', ...state }] }));
  return bus.connect('test');
}

describe('handlePlayerCommand', () => {
  it('does not handle an empty command line', async () => {
    const player = await playerWith({});
    expect(await handlePlayerCommand(player, [])).toEqual({ handled: false, lines: [] });
  });

  it('rejects unknown commands', async () => {
    const player = await playerWith({});
    await expect(handlePlayerCommand(player, ['bogus'])).rejects.toThrow('Command not recognized: bogus');
    await expect(handlePlayerCommand(player, ['bogus'])).rejects.toBeInstanceOf(CommandError);
  });
});

describe('control commands', () => {
  it('changes playback state', async () => {
    const player = await playerWith({ status: 'Stopped' });

    expect(await handlePlayerCommand(player, ['play'])).toEqual({ handled: true, lines: [] });
    expect(await player.getStatus()).toBe('Playing');

    await handlePlayerCommand(player, ['play-pause']);
    expect(await player.getStatus()).toBe('Paused');
  });

  it('skips players that lack the capability', async () => {
    const player = await playerWith({ status: 'Playing', canPause: false });

    expect(await handlePlayerCommand(player, ['pause'])).toEqual({ handled: false, lines: [] });
    expect(await player.getStatus()).toBe('Playing');
  });

  it('refuses a format string', async () => {
    const player = await playerWith({});
    await expect(handlePlayerCommand(player, ['next'], { format: '{{ status }}' })).rejects.toThrow(
      FORMAT_NOT_SUPPORTED,
    );
  });

  it('opens a URI', async () => {
    const player = await playerWith({});
    await handlePlayerCommand(player, ['open', 'https://example.com/stream.ogg']);
    expect((await player.getMetadata()).get('xesam:url')).toEqual({
      kind: 'string',
      value: 'https://example.com/stream.ogg',
    });
  });
});

describe('toPlayerUri', () => {
  it('keeps URIs as they are', () => {
    expect(toPlayerUri('https://example.com/a.mp3', '/music')).toBe('https://example.com/a.mp3');
  });

  it('turns paths into file URIs relative to the working directory', () => {
    expect(toPlayerUri('a b.ogg', '/music')).toBe('file:///music/a%20b.ogg');
    expect(toPlayerUri('/tmp/x.ogg', '/music')).toBe('file:///tmp/x.ogg');
  });
});

describe('parseAmount', () => {
  it('parses absolute and relative amounts', () => {
    expect(parseAmount('10', 'position')).toEqual({ amount: 10, relative: false });
    expect(parseAmount('2.5+', 'position')).toEqual({ amount: 2.5, relative: true });
    expect(parseAmount('0.1-', 'volume')).toEqual({ amount: -0.1, relative: true });
  });

  it('rejects non-numbers', () => {
    expect(() => parseAmount('loud', 'volume')).toThrow('Could not parse volume as a number: loud');
  });
});

describe('position', () => {
  it('prints seconds with six decimals', async () => {
    const player = await playerWith({ position: 1_500_000 });
    expect(await handlePlayerCommand(player, ['position'])).toEqual({ handled: true, lines: ['1.500000'] });
  });

  it('renders through a format string', async () => {
    const player = await playerWith({ position: 1_500_000 });
    const result = await handlePlayerCommand(player, ['position'], { format: '{{ duration(position) }}' });
    expect(result.lines).toEqual(['0:01']);
  });

  it('sets and seeks', async () => {
    const player = await playerWith({ position: 1_000_000 });

    await handlePlayerCommand(player, ['position', '2.5']);
    expect(await player.getPosition()).toBe(2_500_000n);

    await handlePlayerCommand(player, ['position', '5+']);
    expect(await player.getPosition()).toBe(7_500_000n);

    await handlePlayerCommand(player, ['position', '1-']);
    expect(await player.getPosition()).toBe(6_500_000n);
  });

  it('skips players that cannot seek', async () => {
    const player = await playerWith({ position: 1_000_000, canSeek: false });
    expect(await handlePlayerCommand(player, ['position', '3'])).toEqual({ handled: false, lines: [] });
    expect(await player.getPosition()).toBe(1_000_000n);
  });
});

describe('volume', () => {
  it('prints the level with six decimals', async () => {
    const player = await playerWith({ volume: 0.8 });
    expect((await handlePlayerCommand(player, ['volume'])).lines).toEqual(['0.800000']);
  });

  it('renders through a format string', async () => {
    const player = await playerWith({ volume: 0.5 });
    expect((await handlePlayerCommand(player, ['volume'], { format: 'vol={{ volume }}' })).lines).toEqual([
      'vol=0.5',
    ]);
  });

  it('sets the level absolutely and relatively', async () => {
    const player = await playerWith({ volume: 0.8 });

    await handlePlayerCommand(player, ['volume', '0.1-']);
    expect(await player.getVolume()).toBeCloseTo(0.7);

    await handlePlayerCommand(player, ['volume', '0.25']);
    expect(await player.getVolume()).toBe(0.25);
  });
});

describe('status', () => {
  it('prints the status', async () => {
    const player = await playerWith({ status: 'Paused' });
    expect((await handlePlayerCommand(player, ['status'])).lines).toEqual(['Paused']);
  });

  it('prints a placeholder when the player has no status', async () => {
    const player = await playerWith({});
    expect((await handlePlayerCommand(player, ['status'])).lines).toEqual(['Not available']);
  });

  it('renders a missing status as nothing in a format', async () => {
    const player = await playerWith({});
    expect((await handlePlayerCommand(player, ['status'], { format: '[{{ status }}]' })).lines).toEqual(['[]']);
  });
});

describe('metadata', () => {
  const track = {
    'xesam:title': 'T',
    'xesam:artist': ['A'],
    'mpris:length': 215_000_000,
  };

  it('lists every entry without arguments', async () => {
    const player = await playerWith({ metadata: track });
    expect((await handlePlayerCommand(player, ['metadata'])).lines).toEqual([
      'xesam:title\tT',
      'xesam:artist\tA',
      'mpris:length\t215000000',
    ]);
  });

  it('prints the requested keys, aliases included', async () => {
    const player = await playerWith({ metadata: track });
    expect((await handlePlayerCommand(player, ['metadata', 'artist', 'missing', 'mpris:length'])).lines).toEqual([
      'A',
      '215000000',
    ]);
  });

  it('renders a format string against the aliases', async () => {
    const player = await playerWith({ metadata: track });
    const result = await handlePlayerCommand(player, ['metadata'], {
      format: '{{ artist }} - {{ title }} [{{ duration(mpris:length) }}]',
    });
    expect(result.lines).toEqual(['A - T [3:35]']);
  });

  it('skips players without a current track', async () => {
    const player = await playerWith({ metadata: track, canPlay: false });
    expect(await handlePlayerCommand(player, ['metadata'])).toEqual({ handled: false, lines: [] });
  });
});

describe('formatCommandList', () => {
  it('lists every command under one heading', () => {
    const lines = formatCommandList().split('\n');
    expect(lines[0]).toBe('Available Commands:');
    expect(lines).toHaveLength(PLAYER_COMMANDS.length + 1);
    expect(lines[1]).toBe(`  ${'play'.padEnd(24)}Command the player to play`);
  });
});

describe('open', () => {
  it('resolves relative paths against the working directory', async () => {
    const player = await playerWith({});
    await handlePlayerCommand(player, ['open', 'song.ogg']);
    expect((await player.getMetadata()).get('xesam:url')).toEqual({
      kind: 'string',
      value: toPlayerUri(join(process.cwd(), 'song.ogg')),
    });
  });
});
