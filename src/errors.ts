import type { Position } from './types';

export class InvalidPositionError extends Error {
  readonly position: Position;

  constructor(position: Position) {
    super(
      `Position out of range: book ${position.bookIndex}, chapter ${position.chapterIndex}, verse ${position.verseIndex}`
    );
    this.name = 'InvalidPositionError';
    this.position = { ...position };
  }
}

export class CorpusLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CorpusLoadError';
  }
}

export class PersistenceReadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`Failed to read ${filePath}`, options);
    this.name = 'PersistenceReadError';
    this.filePath = filePath;
  }
}

export class PersistenceWriteError extends Error {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super(`Failed to write ${filePath}`, options);
    this.name = 'PersistenceWriteError';
    this.filePath = filePath;
  }
}
