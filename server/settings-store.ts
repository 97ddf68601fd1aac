import type { Position, ReadingConfig, Translation } from '../src/types';
import { TRANSLATIONS } from '../src/types';
import { PersistenceReadError, PersistenceWriteError } from '../src/errors';
import {
  clampFontSize,
  clampWordSpeed,
  DEFAULT_READING_CONFIG,
  readingMode,
} from '../src/reading/pacing';
import { isRecord, readJsonDocument, writeJsonDocument } from './utils/json-file';

export interface PersistedSettings {
  translation: Translation | null;
  reading: ReadingConfig;
  lastPosition: Position;
  musicFolder: string | null;
  musicVolume: number;
  musicEnabled: boolean;
}

// On-disk shape (snake_case, reading mode stored as "chunks" | "word")
interface SettingsDocument {
  bible_version: Translation | null;
  reading_mode: 'chunks' | 'word';
  word_speed: number;
  font_size: number;
  night_mode: boolean;
  fullscreen: boolean;
  last_position: {
    book_index: number;
    chapter_index: number;
    verse_index: number;
  };
  music_folder: string | null;
  music_volume: number;
  music_enabled: boolean;
}

export const DEFAULT_MUSIC_VOLUME = 0.5;

export function defaultSettings(): PersistedSettings {
  return {
    translation: null,
    reading: { ...DEFAULT_READING_CONFIG },
    lastPosition: { bookIndex: 0, chapterIndex: 0, verseIndex: 0 },
    musicFolder: null,
    musicVolume: DEFAULT_MUSIC_VOLUME,
    musicEnabled: true,
  };
}

export function isTranslation(value: unknown): value is Translation {
  return TRANSLATIONS.some(t => t === value);
}

export function clampVolume(volume: number): number {
  return Math.min(1, Math.max(0, volume));
}

function finiteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function boolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function index(value: unknown): number | undefined {
  return Number.isInteger(value) && typeof value === 'number' && value >= 0 ? value : undefined;
}

// Field by field: a missing or malformed field takes its default, unknown fields are dropped
export function parseSettingsDocument(raw: unknown): PersistedSettings {
  const defaults = defaultSettings();
  if (!isRecord(raw)) return defaults;

  const speed = finiteNumber(raw.word_speed);
  const fontSize = finiteNumber(raw.font_size);
  const volume = finiteNumber(raw.music_volume);
  const position: Record<string, unknown> = isRecord(raw.last_position) ? raw.last_position : {};

  return {
    translation: isTranslation(raw.bible_version) ? raw.bible_version : defaults.translation,
    reading: {
      mode: raw.reading_mode === 'word' ? readingMode('word-by-word') : readingMode('chunks'),
      wordSpeedSeconds: speed === undefined ? defaults.reading.wordSpeedSeconds : clampWordSpeed(speed),
      fontSize: fontSize === undefined ? defaults.reading.fontSize : clampFontSize(fontSize),
      nightMode: boolean(raw.night_mode) ?? defaults.reading.nightMode,
      fullscreen: boolean(raw.fullscreen) ?? defaults.reading.fullscreen,
    },
    lastPosition: {
      bookIndex: index(position.book_index) ?? 0,
      chapterIndex: index(position.chapter_index) ?? 0,
      verseIndex: index(position.verse_index) ?? 0,
    },
    musicFolder: typeof raw.music_folder === 'string' && raw.music_folder.length > 0 ? raw.music_folder : null,
    musicVolume: volume === undefined ? defaults.musicVolume : clampVolume(volume),
    musicEnabled: boolean(raw.music_enabled) ?? defaults.musicEnabled,
  };
}

export function toSettingsDocument(settings: PersistedSettings): SettingsDocument {
  return {
    bible_version: settings.translation,
    reading_mode: settings.reading.mode.kind === 'word-by-word' ? 'word' : 'chunks',
    word_speed: settings.reading.wordSpeedSeconds,
    font_size: settings.reading.fontSize,
    night_mode: settings.reading.nightMode,
    fullscreen: settings.reading.fullscreen,
    last_position: {
      book_index: settings.lastPosition.bookIndex,
      chapter_index: settings.lastPosition.chapterIndex,
      verse_index: settings.lastPosition.verseIndex,
    },
    music_folder: settings.musicFolder,
    music_volume: settings.musicVolume,
    music_enabled: settings.musicEnabled,
  };
}

/**
 * The settings document. Every change is written through immediately; a
 * failed write is logged and the document stays dirty until the next
 * successful checkpoint.
 */
export class SettingsStore {
  private readonly filePath: string;
  private settings: PersistedSettings;
  private dirty = false;

  private constructor(filePath: string, settings: PersistedSettings) {
    this.filePath = filePath;
    this.settings = settings;
  }

  static load(filePath: string): SettingsStore {
    let settings = defaultSettings();
    try {
      const raw = readJsonDocument(filePath);
      if (raw !== undefined) {
        settings = parseSettingsDocument(raw);
      }
    } catch (err) {
      if (!(err instanceof PersistenceReadError)) throw err;
      console.warn(`${err.message}, using default settings:`, err.cause);
    }
    return new SettingsStore(filePath, settings);
  }

  get(): PersistedSettings {
    return {
      ...this.settings,
      reading: { ...this.settings.reading },
      lastPosition: { ...this.settings.lastPosition },
    };
  }

  isFirstRun(): boolean {
    return this.settings.translation === null;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  update(patch: Partial<PersistedSettings>): void {
    this.settings = { ...this.settings, ...patch };
    this.save();
  }

  savePosition(position: Position): void {
    this.update({ lastPosition: { ...position } });
  }

  saveReadingConfig(config: ReadingConfig): void {
    this.update({ reading: { ...config } });
  }

  save(): boolean {
    try {
      writeJsonDocument(this.filePath, toSettingsDocument(this.settings));
      this.dirty = false;
      return true;
    } catch (err) {
      if (!(err instanceof PersistenceWriteError)) throw err;
      this.dirty = true;
      console.warn(`${err.message}, will retry on next checkpoint:`, err.cause);
      return false;
    }
  }

  flush(): void {
    if (this.dirty) {
      this.save();
    }
  }
}
