import type { Position, SessionEvent, Translation } from '../src/types';
import type { Corpus } from '../src/corpus/corpus';
import { InvalidPositionError } from '../src/errors';
import { ReadingEngine } from '../src/reading/engine';
import type { Scheduler } from '../src/reading/scheduler';
import type { HistoryStore, ReadingStats } from './history-store';
import type { MusicPlayer, MusicState } from './music';
import type { SettingsStore } from './settings-store';

export const DEFAULT_TRANSLATION: Translation = 'acf';

export type AppEvent =
  | SessionEvent
  | { type: 'sessionEntered'; position: Position; reference: string }
  | { type: 'sessionExited' }
  | { type: 'audioStateChanged'; state: MusicState };

type Listener<T> = (data: T) => void;

export interface SessionManagerOptions {
  settings: SettingsStore;
  history: HistoryStore;
  music: MusicPlayer;
  loadCorpus: (translation: Translation) => Corpus;
  scheduler?: Scheduler;
}

const START: Position = { bookIndex: 0, chapterIndex: 0, verseIndex: 0 };

/**
 * Owns the active corpus and at most one reading engine. The engine only
 * lives while the reader is on the reading screen; re-entering builds a new
 * one from the saved position.
 */
export class SessionManager {
  private readonly settings: SettingsStore;
  private readonly history: HistoryStore;
  private readonly music: MusicPlayer;
  private readonly loadCorpus: (translation: Translation) => Corpus;
  private readonly scheduler: Scheduler | undefined;

  private corpora = new Map<Translation, Corpus>();
  private translation: Translation;
  private engine: ReadingEngine | null = null;
  private detachEngine: (() => void) | null = null;
  private listeners = new Set<Listener<AppEvent>>();

  constructor(options: SessionManagerOptions) {
    this.settings = options.settings;
    this.history = options.history;
    this.music = options.music;
    this.loadCorpus = options.loadCorpus;
    this.scheduler = options.scheduler;
    this.translation = this.settings.get().translation ?? DEFAULT_TRANSLATION;

    const { musicFolder, musicVolume } = this.settings.get();
    this.music.setVolume(musicVolume);
    this.music.setFolder(musicFolder);
    this.music.onChange(state => this.emit({ type: 'audioStateChanged', state }));
  }

  getTranslation(): Translation {
    return this.translation;
  }

  isFirstRun(): boolean {
    return this.settings.isFirstRun();
  }

  getCorpus(): Corpus {
    return this.corpusFor(this.translation);
  }

  current(): ReadingEngine | null {
    return this.engine;
  }

  // Starts a fresh engine; without a position it resumes from the saved one
  enter(position?: Position): ReadingEngine {
    const corpus = this.getCorpus();
    if (position && !corpus.isValid(position)) {
      throw new InvalidPositionError(position);
    }

    this.exit();

    const saved = this.settings.get();
    const engine = new ReadingEngine({
      corpus,
      progress: this.history,
      checkpoint: this.settings,
      position: position ?? saved.lastPosition,
      config: saved.reading,
      audio: this.music,
      isMusicEnabled: () => this.settings.get().musicEnabled,
      scheduler: this.scheduler,
    });

    this.engine = engine;
    this.detachEngine = engine.subscribe(event => this.emit(event));
    // Persist the start so a fallback from a bad saved position sticks
    this.settings.savePosition(engine.getPosition());

    const entered = engine.getPosition();
    this.emit({ type: 'sessionEntered', position: entered, reference: corpus.reference(entered) });
    return engine;
  }

  exit(): void {
    if (!this.engine) return;
    this.engine.stop();
    this.detachEngine?.();
    this.detachEngine = null;
    this.engine = null;
    this.history.flush();
    this.emit({ type: 'sessionExited' });
  }

  /**
   * Loads the other corpus before committing, so a bad corpus file leaves
   * the current translation in place. An open session is re-entered at the
   * same position when it exists in the new corpus.
   */
  setTranslation(translation: Translation): void {
    const corpus = this.corpusFor(translation);
    const wasOpen = this.engine !== null;
    const position = this.engine?.getPosition() ?? this.settings.get().lastPosition;

    this.exit();
    this.translation = translation;
    const target = corpus.isValid(position) ? position : START;
    this.settings.update({ translation, lastPosition: { ...target } });

    if (wasOpen) {
      this.enter(target);
    }
  }

  setMusicEnabled(enabled: boolean): void {
    this.settings.update({ musicEnabled: enabled });
    if (!enabled) {
      this.music.pause();
    } else if (this.engine?.isPlaying()) {
      this.music.play();
    }
  }

  setMusicVolume(volume: number): void {
    this.music.setVolume(volume);
    this.settings.update({ musicVolume: this.music.getState().volume });
  }

  setMusicFolder(folder: string | null): boolean {
    const found = this.music.setFolder(folder);
    this.settings.update({ musicFolder: folder });
    return found;
  }

  getStats(): ReadingStats {
    return this.history.getStats(this.getCorpus().totalChapters());
  }

  subscribe(listener: Listener<AppEvent>): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  close(): void {
    this.exit();
    this.history.flush();
    this.settings.flush();
  }

  private corpusFor(translation: Translation): Corpus {
    let corpus = this.corpora.get(translation);
    if (!corpus) {
      corpus = this.loadCorpus(translation);
      this.corpora.set(translation, corpus);
    }
    return corpus;
  }

  private emit(event: AppEvent): void {
    this.listeners.forEach(cb => {
      try {
        cb(event);
      } catch (err) {
        console.error(`Session listener failed on ${event.type}:`, err);
      }
    });
  }
}
