import type { Frame, ReadingConfig, ReadingMode, ReadingModeKind } from '../types';

export const MIN_FRAME_SECONDS = 0.5;

export const DEFAULT_WORD_SPEED = 1.0;
export const MIN_WORD_SPEED = 0.1;
export const MAX_WORD_SPEED = 5.0;
export const WORD_SPEED_STEP = 0.1;

export const DEFAULT_FONT_SIZE = 32;
export const MIN_FONT_SIZE = 16;
export const MAX_FONT_SIZE = 72;
export const FONT_SIZE_STEP = 2;

export const CHUNKS: ReadingMode = { kind: 'chunks' };
export const WORD_BY_WORD: ReadingMode = { kind: 'word-by-word' };

export const DEFAULT_READING_CONFIG: ReadingConfig = {
  mode: CHUNKS,
  wordSpeedSeconds: DEFAULT_WORD_SPEED,
  fontSize: DEFAULT_FONT_SIZE,
  nightMode: false,
  fullscreen: false,
};

export function readingMode(kind: ReadingModeKind): ReadingMode {
  return kind === 'chunks' ? CHUNKS : WORD_BY_WORD;
}

export function tokenize(verse: string): string[] {
  return verse.split(/\s+/).filter(w => w.length > 0);
}

export function countWords(verse: string): number {
  return tokenize(verse).length;
}

// Non-finite input falls back to the default
export function clampWordSpeed(seconds: number): number {
  if (!Number.isFinite(seconds)) return DEFAULT_WORD_SPEED;
  return Math.min(MAX_WORD_SPEED, Math.max(MIN_WORD_SPEED, seconds));
}

export function clampFontSize(size: number): number {
  if (!Number.isFinite(size)) return DEFAULT_FONT_SIZE;
  return Math.min(MAX_FONT_SIZE, Math.max(MIN_FONT_SIZE, Math.round(size)));
}

// Step by tenths without accumulating float drift (0.1 + 0.2 !== 0.3)
export function stepWordSpeed(seconds: number, delta: number): number {
  return clampWordSpeed(Math.round((seconds + delta) * 10) / 10);
}

function chunkFrames(verse: string, wordSpeedSeconds: number): Frame[] {
  const words = countWords(verse);
  return [{
    text: words === 0 ? '' : verse.trim(),
    durationSeconds: Math.max(MIN_FRAME_SECONDS, words * wordSpeedSeconds),
  }];
}

function wordFrames(verse: string, wordSpeedSeconds: number): Frame[] {
  const words = tokenize(verse);
  if (words.length === 0) {
    return [{ text: '', durationSeconds: MIN_FRAME_SECONDS }];
  }
  return words.map(text => ({ text, durationSeconds: wordSpeedSeconds }));
}

// Single entry point: never returns an empty list, so the timer loop
// always has something to schedule.
export function buildFrames(verse: string, mode: ReadingMode, wordSpeedSeconds: number): Frame[] {
  switch (mode.kind) {
    case 'chunks':
      return chunkFrames(verse, wordSpeedSeconds);
    case 'word-by-word':
      return wordFrames(verse, wordSpeedSeconds);
  }
}

export function frameDelayMs(frame: Frame): number {
  return Math.round(frame.durationSeconds * 1000);
}

export function normalizeReadingConfig(config: ReadingConfig): ReadingConfig {
  return {
    mode: readingMode(config.mode.kind),
    wordSpeedSeconds: clampWordSpeed(config.wordSpeedSeconds),
    fontSize: clampFontSize(config.fontSize),
    nightMode: config.nightMode,
    fullscreen: config.fullscreen,
  };
}
