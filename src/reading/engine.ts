import type {
  AudioCoordinator,
  Frame,
  Position,
  ProgressTracker,
  ReadingConfig,
  SessionCheckpoint,
  SessionEvent,
  SessionEventType,
  SessionSnapshot,
  SessionStatus,
  VerseCursor,
} from '../types';
import type { Corpus } from '../corpus/corpus';
import { InvalidPositionError } from '../errors';
import {
  buildFrames,
  DEFAULT_READING_CONFIG,
  FONT_SIZE_STEP,
  frameDelayMs,
  normalizeReadingConfig,
  readingMode,
  stepWordSpeed,
  WORD_SPEED_STEP,
} from './pacing';
import { timerScheduler } from './scheduler';
import type { Scheduler, TaskHandle } from './scheduler';

type Listener<T> = (data: T) => void;

type EventOf<T extends SessionEventType> = Extract<SessionEvent, { type: T }>;

function isEventOf<T extends SessionEventType>(event: SessionEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

export interface ReadingEngineOptions {
  corpus: Corpus;
  progress: ProgressTracker;
  checkpoint: SessionCheckpoint;
  position?: Position | null;
  config?: Partial<ReadingConfig>;
  audio?: AudioCoordinator | null;
  isMusicEnabled?: () => boolean;
  scheduler?: Scheduler;
}

const START: Position = { bookIndex: 0, chapterIndex: 0, verseIndex: 0 };

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

/**
 * Paces a corpus verse by verse. Owns the position, the reading config and
 * the per-verse frame cursor; persistence and audio are reached only through
 * the sinks passed in.
 *
 * At most one frame task is pending at any time. Every transition away from
 * `playing` and every jump cancels it before anything new is scheduled, and a
 * task that fires with a stale handle is ignored.
 */
export class ReadingEngine {
  private readonly corpus: Corpus;
  private readonly progress: ProgressTracker;
  private readonly checkpoint: SessionCheckpoint;
  private readonly audio: AudioCoordinator | null;
  private readonly isMusicEnabled: () => boolean;
  private readonly scheduler: Scheduler;

  private status: SessionStatus = 'paused';
  private position: Position;
  private config: ReadingConfig;
  private cursor: VerseCursor;
  private elapsedSecondsThisSession = 0;
  private pendingTask: TaskHandle | null = null;
  private listeners = new Set<Listener<SessionEvent>>();

  constructor(options: ReadingEngineOptions) {
    this.corpus = options.corpus;
    this.progress = options.progress;
    this.checkpoint = options.checkpoint;
    this.audio = options.audio ?? null;
    this.isMusicEnabled = options.isMusicEnabled ?? (() => true);
    this.scheduler = options.scheduler ?? timerScheduler;

    this.config = normalizeReadingConfig({ ...DEFAULT_READING_CONFIG, ...options.config });

    const requested = options.position;
    if (requested && this.corpus.isValid(requested)) {
      this.position = { ...requested };
    } else {
      if (requested) {
        console.warn(`Saved position ${this.describe(requested)} is outside the ${this.corpus.translation} corpus, starting over`);
      }
      this.position = { ...START };
    }

    this.cursor = this.buildCursor();
  }

  // === Queries ===

  getStatus(): SessionStatus {
    return this.status;
  }

  isPlaying(): boolean {
    return this.status === 'playing';
  }

  getPosition(): Position {
    return { ...this.position };
  }

  getConfig(): ReadingConfig {
    return { ...this.config };
  }

  getCursor(): VerseCursor {
    return {
      frames: this.cursor.frames.map(f => ({ ...f })),
      frameIndex: this.cursor.frameIndex,
    };
  }

  getCurrentFrame(): Frame {
    return { ...this.currentFrame() };
  }

  getElapsedSeconds(): number {
    return this.elapsedSecondsThisSession;
  }

  getSnapshot(): SessionSnapshot {
    return {
      status: this.status,
      position: this.getPosition(),
      reference: this.corpus.reference(this.position),
      frame: this.getCurrentFrame(),
      frameIndex: this.cursor.frameIndex,
      frameCount: this.cursor.frames.length,
      verseCount: this.corpus.chapterLength(this.position.bookIndex, this.position.chapterIndex),
      config: this.getConfig(),
      elapsedSecondsThisSession: this.elapsedSecondsThisSession,
    };
  }

  // === Events ===

  subscribe(listener: Listener<SessionEvent>): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  on<T extends SessionEventType>(type: T, listener: Listener<EventOf<T>>): () => void {
    return this.subscribe(event => {
      if (isEventOf(event, type)) {
        listener(event);
      }
    });
  }

  // === Play state ===

  togglePlayPause(): void {
    if (this.status === 'playing') {
      this.pause();
    } else {
      this.play();
    }
  }

  play(): void {
    if (this.status !== 'paused') return;
    this.setStatus('playing');
    this.signalAudio('play');
    this.scheduleCurrentFrame();
  }

  pause(): void {
    if (this.status !== 'playing') return;
    this.cancelPending();
    this.setStatus('paused');
    this.signalAudio('pause');
  }

  // Leaves the reading screen. The engine is inert afterwards.
  stop(): void {
    if (this.status === 'stopped') return;
    this.cancelPending();
    const wasPlaying = this.status === 'playing';
    this.status = 'stopped';
    if (wasPlaying) {
      this.emit({ type: 'playStateChanged', isPlaying: false });
    }
    this.audio?.stop();
    this.checkpoint.savePosition(this.getPosition());
  }

  // === Navigation ===

  manualNext(): void {
    if (this.status === 'stopped') return;
    const target = this.corpus.next(this.position);
    if (target) {
      this.moveTo(target);
    }
  }

  manualPrevious(): void {
    if (this.status === 'stopped') return;
    const target = this.corpus.previous(this.position);
    if (target) {
      this.moveTo(target);
    }
  }

  selectPosition(position: Position): void {
    if (!this.corpus.isValid(position)) {
      throw new InvalidPositionError(position);
    }
    if (this.status === 'stopped') return;
    this.moveTo(position);
  }

  // === Configuration ===

  setConfig(partial: Partial<ReadingConfig>): void {
    if (this.status === 'stopped') return;

    const previous = this.config;
    // A non-finite number leaves the current value in place
    const next = normalizeReadingConfig({
      ...previous,
      ...partial,
      wordSpeedSeconds: finiteOr(partial.wordSpeedSeconds, previous.wordSpeedSeconds),
      fontSize: finiteOr(partial.fontSize, previous.fontSize),
    });
    const paceChanged =
      next.mode.kind !== previous.mode.kind ||
      next.wordSpeedSeconds !== previous.wordSpeedSeconds;

    this.config = next;
    this.checkpoint.saveReadingConfig(this.getConfig());
    this.emit({ type: 'configChanged', config: this.getConfig() });

    if (paceChanged) {
      // Same verse, new granularity: restart it from its first frame
      this.cancelPending();
      this.cursor = this.buildCursor();
      this.emitFrame();
      this.scheduleCurrentFrame();
    }
  }

  toggleMode(): void {
    this.setConfig({ mode: readingMode(this.config.mode.kind === 'chunks' ? 'word-by-word' : 'chunks') });
  }

  // Faster means fewer seconds per word
  increaseSpeed(): void {
    this.setConfig({ wordSpeedSeconds: stepWordSpeed(this.config.wordSpeedSeconds, -WORD_SPEED_STEP) });
  }

  decreaseSpeed(): void {
    this.setConfig({ wordSpeedSeconds: stepWordSpeed(this.config.wordSpeedSeconds, WORD_SPEED_STEP) });
  }

  increaseFont(): void {
    this.setConfig({ fontSize: this.config.fontSize + FONT_SIZE_STEP });
  }

  decreaseFont(): void {
    this.setConfig({ fontSize: this.config.fontSize - FONT_SIZE_STEP });
  }

  toggleNightMode(): void {
    this.setConfig({ nightMode: !this.config.nightMode });
  }

  toggleFullscreen(): void {
    this.setConfig({ fullscreen: !this.config.fullscreen });
  }

  // === Internals ===

  private currentFrame(): Frame {
    return this.cursor.frames[this.cursor.frameIndex] ?? this.cursor.frames[0];
  }

  private buildCursor(): VerseCursor {
    const { bookIndex, chapterIndex, verseIndex } = this.position;
    const verse = this.corpus.getVerse(bookIndex, chapterIndex, verseIndex);
    return {
      frames: buildFrames(verse, this.config.mode, this.config.wordSpeedSeconds),
      frameIndex: 0,
    };
  }

  private moveTo(target: Position): void {
    this.cancelPending();
    this.position = { ...target };
    this.cursor = this.buildCursor();
    this.checkpoint.savePosition(this.getPosition());
    this.emit({
      type: 'positionChanged',
      position: this.getPosition(),
      reference: this.corpus.reference(this.position),
    });
    this.emitFrame();
    this.scheduleCurrentFrame();
  }

  private scheduleCurrentFrame(): void {
    if (this.status !== 'playing') return;
    this.cancelPending();
    const handle = this.scheduler.schedule(frameDelayMs(this.currentFrame()), () => {
      this.onFrameElapsed(handle);
    });
    this.pendingTask = handle;
  }

  private cancelPending(): void {
    if (this.pendingTask !== null) {
      this.scheduler.cancel(this.pendingTask);
      this.pendingTask = null;
    }
  }

  private onFrameElapsed(handle: TaskHandle): void {
    if (handle !== this.pendingTask || this.status !== 'playing') return;
    this.pendingTask = null;

    const { durationSeconds } = this.currentFrame();
    this.elapsedSecondsThisSession += durationSeconds;
    this.progress.addReadingTime(durationSeconds);

    if (this.cursor.frameIndex + 1 < this.cursor.frames.length) {
      this.cursor.frameIndex++;
      this.emitFrame();
      this.scheduleCurrentFrame();
      return;
    }

    this.completeVerse();
  }

  private completeVerse(): void {
    const finished = this.getPosition();
    this.emit({ type: 'verseCompleted', position: finished });
    this.progress.addVersesRead(1);

    const next = this.corpus.next(finished);
    const leavingChapter =
      next === null ||
      next.bookIndex !== finished.bookIndex ||
      next.chapterIndex !== finished.chapterIndex;

    if (leavingChapter) {
      this.markChapterRead(finished);
    }

    if (next) {
      this.moveTo(next);
      return;
    }

    // End of corpus: stop pacing, leave the music alone
    this.cancelPending();
    this.setStatus('paused');
  }

  private markChapterRead({ bookIndex, chapterIndex }: Position): void {
    const bookId = this.corpus.bookId(bookIndex);
    this.progress.markChapterRead(bookId, chapterIndex);
    this.emit({ type: 'chapterCompleted', bookId, chapterIndex });
  }

  private signalAudio(action: 'play' | 'pause'): void {
    if (!this.audio || !this.isMusicEnabled() || !this.audio.isAvailable()) return;
    if (action === 'play') {
      this.audio.play();
    } else {
      this.audio.pause();
    }
  }

  private setStatus(status: SessionStatus): void {
    if (this.status === status) return;
    this.status = status;
    this.emit({ type: 'playStateChanged', isPlaying: status === 'playing' });
  }

  private emitFrame(): void {
    this.emit({ type: 'frameChanged', frame: this.getCurrentFrame(), frameIndex: this.cursor.frameIndex });
  }

  private emit(event: SessionEvent): void {
    this.listeners.forEach(cb => cb(event));
  }

  private describe({ bookIndex, chapterIndex, verseIndex }: Position): string {
    return `${bookIndex}/${chapterIndex}/${verseIndex}`;
  }
}
