export type Translation = 'acf' | 'nvi';

export const TRANSLATIONS: readonly Translation[] = ['acf', 'nvi'];

export interface Position {
  bookIndex: number;
  chapterIndex: number;
  verseIndex: number;
}

export type ReadingMode = { kind: 'chunks' } | { kind: 'word-by-word' };

export type ReadingModeKind = ReadingMode['kind'];

export interface ReadingConfig {
  mode: ReadingMode;
  wordSpeedSeconds: number;
  fontSize: number;
  nightMode: boolean;
  fullscreen: boolean;
}

export interface Frame {
  text: string;
  durationSeconds: number;
}

export interface VerseCursor {
  frames: Frame[];
  frameIndex: number;
}

export type SessionStatus = 'stopped' | 'playing' | 'paused';

export interface SessionSnapshot {
  status: SessionStatus;
  position: Position;
  reference: string;
  frame: Frame;
  frameIndex: number;
  frameCount: number;
  verseCount: number;
  config: ReadingConfig;
  elapsedSecondsThisSession: number;
}

export interface ChapterRef {
  bookId: string;
  chapterIndex: number;
}

export interface ProgressRecord {
  chaptersRead: ChapterRef[];
  totalVersesRead: number;
  totalTimeReadingSeconds: number;
}

export type SessionEvent =
  | { type: 'frameChanged'; frame: Frame; frameIndex: number }
  | { type: 'positionChanged'; position: Position; reference: string }
  | { type: 'verseCompleted'; position: Position }
  | { type: 'chapterCompleted'; bookId: string; chapterIndex: number }
  | { type: 'playStateChanged'; isPlaying: boolean }
  | { type: 'configChanged'; config: ReadingConfig };

export type SessionEventType = SessionEvent['type'];

// Sinks the engine appends to; implemented by the persistence layer.
export interface ProgressTracker {
  markChapterRead(bookId: string, chapterIndex: number): void;
  addVersesRead(count: number): void;
  addReadingTime(seconds: number): void;
}

export interface SessionCheckpoint {
  savePosition(position: Position): void;
  saveReadingConfig(config: ReadingConfig): void;
}

export interface AudioCoordinator {
  isAvailable(): boolean;
  play(): void;
  pause(): void;
  stop(): void;
  next(): void;
  previous(): void;
  setVolume(volume: number): void;
}
