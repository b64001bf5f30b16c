import { describe, it, expect } from 'vitest';
import { parsePlayerList, playerNameMatches, selectPlayers } from '../selection.js';

describe('parsePlayerList', () => {
  it('returns undefined when no list was given', () => {
    expect(parsePlayerList(undefined)).toBeUndefined();
  });

  it('splits, trims and drops empty names', () => {
    expect(parsePlayerList(' vlc, spotify ,,')).toEqual(['vlc', 'spotify']);
  });
});

describe('playerNameMatches', () => {
  it('matches the exact name', () => {
    expect(playerNameMatches('vlc', 'vlc')).toBe(true);
  });

  it('matches an instance of the player', () => {
    expect(playerNameMatches('vlc', 'vlc.instance4242')).toBe(true);
  });

  it('does not match a longer name or another suffix', () => {
    expect(playerNameMatches('vlc', 'vlcx')).toBe(false);
    expect(playerNameMatches('vlc', 'vlc.other')).toBe(false);
    expect(playerNameMatches('vlc.instance1', 'vlc')).toBe(false);
  });
});

describe('selectPlayers', () => {
  const available = ['spotify', 'vlc.instance1', 'vlc.instance2', 'mpd'];

  it('follows the order of the requested names', () => {
    expect(selectPlayers(['vlc', 'spotify'], available)).toEqual(['vlc.instance1', 'vlc.instance2', 'spotify']);
  });

  it('skips ignored players and their instances', () => {
    expect(selectPlayers(['vlc', 'spotify'], available, ['vlc.instance2'])).toEqual(['vlc.instance1', 'spotify']);
    expect(selectPlayers(available, available, ['vlc'])).toEqual(['spotify', 'mpd']);
  });

  it('lists each player once', () => {
    expect(selectPlayers(['spotify', 'spotify'], available)).toEqual(['spotify']);
  });

  it('returns nothing when no request matches', () => {
    expect(selectPlayers(['rhythmbox'], available)).toEqual([]);
  });
});
