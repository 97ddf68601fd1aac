import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { MusicPlayer } from './music';
import type { MusicState } from './music';

// random() === 0.99 makes every Fisher-Yates swap a no-op
const keepOrder = () => 0.99;

describe('MusicPlayer', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'versepace-music-'));
    for (const name of ['b.mp3', 'a.OGG', 'c.flac', 'notes.txt', 'd.wav']) {
      fs.writeFileSync(path.join(dir, name), '');
    }
    fs.mkdirSync(path.join(dir, 'nested.mp3'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists supported files case-insensitively', () => {
    const player = new MusicPlayer({ random: keepOrder });
    expect(player.setFolder(dir)).toBe(true);

    const state = player.getState();
    expect(state.trackCount).toBe(4);
    expect(state.trackName).toBe('a.OGG');
    expect(state.available).toBe(true);
    expect(player.currentTrackPath()).toBe(path.join(dir, 'a.OGG'));
  });

  it('reports an empty playlist for a missing folder', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const player = new MusicPlayer();

    expect(player.setFolder(path.join(dir, 'missing'))).toBe(false);
    expect(warn).toHaveBeenCalledOnce();
    expect(player.isAvailable()).toBe(false);
    expect(player.currentTrackPath()).toBeNull();
  });

  it('does not play without tracks', () => {
    const player = new MusicPlayer();
    player.play();
    expect(player.getState().playing).toBe(false);
  });

  it('wraps around in both directions', () => {
    const player = new MusicPlayer({ random: keepOrder });
    player.setFolder(dir);

    player.previous();
    expect(player.getState().trackName).toBe('d.wav');
    player.next();
    player.next();
    expect(player.getState().trackName).toBe('b.mp3');
  });

  it('advances on track end only while playing', () => {
    const player = new MusicPlayer({ random: keepOrder });
    player.setFolder(dir);

    player.trackEnded();
    expect(player.getState().trackIndex).toBe(0);

    player.play();
    player.trackEnded();
    expect(player.getState().trackIndex).toBe(1);
  });

  it('clamps the volume', () => {
    const player = new MusicPlayer({ volume: 2 });
    expect(player.getState().volume).toBe(1);
    player.setVolume(-0.5);
    expect(player.getState().volume).toBe(0);
  });

  it('keeps the current track first when shuffle is turned back on', () => {
    const player = new MusicPlayer({ random: keepOrder });
    player.setFolder(dir);
    player.next();

    expect(player.toggleShuffle()).toBe(false);
    expect(player.toggleShuffle()).toBe(true);

    const state = player.getState();
    expect(state.trackIndex).toBe(0);
    expect(state.trackName).toBe('b.mp3');
  });

  it('notifies listeners until they unsubscribe', () => {
    const player = new MusicPlayer({ random: keepOrder });
    player.setFolder(dir);
    const listener = vi.fn<(state: MusicState) => void>();
    const unsubscribe = player.onChange(listener);

    player.play();
    player.pause();
    unsubscribe();
    player.play();

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls.map(([state]) => state.playing)).toEqual([true, false]);
  });
});
