import * as fs from 'fs';
import * as path from 'path';
import type { AudioCoordinator } from '../src/types';
import { clampVolume, DEFAULT_MUSIC_VOLUME } from './settings-store';

export const SUPPORTED_FORMATS = ['.mp3', '.wav', '.ogg', '.flac'];

export interface MusicState {
  folder: string | null;
  available: boolean;
  playing: boolean;
  shuffle: boolean;
  volume: number;
  trackIndex: number;
  trackCount: number;
  trackName: string | null;
}

type Listener<T> = (data: T) => void;

function shuffleInPlace<T>(items: T[], random: () => number): void {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
}

/**
 * Background playlist. The server only keeps the transport state; the
 * renderer plays `currentTrackPath()` and follows `onChange`.
 */
export class MusicPlayer implements AudioCoordinator {
  private folder: string | null = null;
  private playlist: string[] = [];
  private index = 0;
  private playing = false;
  private shuffle = true;
  private volume = DEFAULT_MUSIC_VOLUME;
  private listeners = new Set<Listener<MusicState>>();
  private readonly random: () => number;

  constructor(options: { random?: () => number; volume?: number } = {}) {
    this.random = options.random ?? Math.random;
    if (options.volume !== undefined) {
      this.volume = clampVolume(options.volume);
    }
  }

  // true when the folder holds at least one playable file
  setFolder(folder: string | null): boolean {
    this.playing = false;
    this.playlist = [];
    this.index = 0;
    this.folder = folder;

    if (folder) {
      try {
        this.playlist = fs.readdirSync(folder, { withFileTypes: true })
          .filter(entry => entry.isFile() && SUPPORTED_FORMATS.includes(path.extname(entry.name).toLowerCase()))
          .map(entry => path.resolve(folder, entry.name))
          .sort();
      } catch (err) {
        console.warn(`Music folder not readable: ${folder}`, err);
      }
      if (this.shuffle) {
        shuffleInPlace(this.playlist, this.random);
      }
    }

    this.notify();
    return this.playlist.length > 0;
  }

  isAvailable(): boolean {
    return this.playlist.length > 0;
  }

  play(): void {
    if (!this.isAvailable() || this.playing) return;
    this.playing = true;
    this.notify();
  }

  pause(): void {
    if (!this.playing) return;
    this.playing = false;
    this.notify();
  }

  stop(): void {
    this.pause();
  }

  toggle(): void {
    if (this.playing) {
      this.pause();
    } else {
      this.play();
    }
  }

  next(): void {
    if (!this.isAvailable()) return;
    this.index = (this.index + 1) % this.playlist.length;
    this.notify();
  }

  previous(): void {
    if (!this.isAvailable()) return;
    this.index = (this.index - 1 + this.playlist.length) % this.playlist.length;
    this.notify();
  }

  // Called by the renderer when its audio element runs out
  trackEnded(): void {
    if (this.playing) {
      this.next();
    }
  }

  setVolume(volume: number): void {
    this.volume = clampVolume(volume);
    this.notify();
  }

  // Reshuffles with the current track moved to the front
  toggleShuffle(): boolean {
    this.shuffle = !this.shuffle;
    if (this.shuffle && this.playlist.length > 0) {
      const current = this.playlist[this.index];
      const rest = this.playlist.filter((_, i) => i !== this.index);
      shuffleInPlace(rest, this.random);
      this.playlist = [current, ...rest];
      this.index = 0;
    }
    this.notify();
    return this.shuffle;
  }

  currentTrackPath(): string | null {
    return this.playlist[this.index] ?? null;
  }

  getState(): MusicState {
    const track = this.currentTrackPath();
    return {
      folder: this.folder,
      available: this.isAvailable(),
      playing: this.playing,
      shuffle: this.shuffle,
      volume: this.volume,
      trackIndex: this.index,
      trackCount: this.playlist.length,
      trackName: track ? path.basename(track) : null,
    };
  }

  onChange(callback: Listener<MusicState>): () => void {
    this.listeners.add(callback);
    return () => this.listeners.delete(callback);
  }

  private notify(): void {
    const state = this.getState();
    this.listeners.forEach(cb => cb(state));
  }
}
