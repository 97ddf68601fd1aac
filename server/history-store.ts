import type { ChapterRef, ProgressRecord, ProgressTracker } from '../src/types';
import { PersistenceReadError, PersistenceWriteError } from '../src/errors';
import { isRecord, readJsonDocument, writeJsonDocument } from './utils/json-file';

// On-disk shape
interface HistoryDocument {
  chapters_read: Array<{ book: string; chapter: number }>;
  total_verses_read: number;
  total_time_reading: number;
}

export interface ReadingStats {
  chaptersRead: number;
  totalChapters: number;
  totalVersesRead: number;
  totalTimeSeconds: number;
  hours: number;
  minutes: number;
  progressPercent: number;
}

const SAVE_DEBOUNCE_MS = 100;

function chapterKey(bookId: string, chapterIndex: number): string {
  return `${bookId}\u0000${chapterIndex}`;
}

function nonNegative(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : 0;
}

export function parseHistoryDocument(raw: unknown): ProgressRecord {
  const record: ProgressRecord = { chaptersRead: [], totalVersesRead: 0, totalTimeReadingSeconds: 0 };
  if (!isRecord(raw)) return record;

  const seen = new Set<string>();
  if (Array.isArray(raw.chapters_read)) {
    for (const entry of raw.chapters_read) {
      if (!isRecord(entry) || typeof entry.book !== 'string') continue;
      const chapter = entry.chapter;
      if (typeof chapter !== 'number' || !Number.isInteger(chapter) || chapter < 0) continue;
      const key = chapterKey(entry.book, chapter);
      if (seen.has(key)) continue;
      seen.add(key);
      record.chaptersRead.push({ bookId: entry.book, chapterIndex: chapter });
    }
  }

  record.totalVersesRead = Math.floor(nonNegative(raw.total_verses_read));
  record.totalTimeReadingSeconds = nonNegative(raw.total_time_reading);
  return record;
}

function toHistoryDocument(record: ProgressRecord): HistoryDocument {
  return {
    chapters_read: record.chaptersRead.map(c => ({ book: c.bookId, chapter: c.chapterIndex })),
    total_verses_read: record.totalVersesRead,
    total_time_reading: record.totalTimeReadingSeconds,
  };
}

/**
 * Cumulative reading progress. The engine only appends to it; writes are
 * batched since reading time arrives on every frame.
 */
export class HistoryStore implements ProgressTracker {
  private readonly filePath: string;
  private record: ProgressRecord;
  private readKeys: Set<string>;
  private saveTimer: ReturnType<typeof setTimeout> | null = null;
  private dirty = false;

  private constructor(filePath: string, record: ProgressRecord) {
    this.filePath = filePath;
    this.record = record;
    this.readKeys = new Set(record.chaptersRead.map(c => chapterKey(c.bookId, c.chapterIndex)));
  }

  static load(filePath: string): HistoryStore {
    let record = parseHistoryDocument(undefined);
    try {
      const raw = readJsonDocument(filePath);
      if (raw !== undefined) {
        record = parseHistoryDocument(raw);
      }
    } catch (err) {
      if (!(err instanceof PersistenceReadError)) throw err;
      console.warn(`${err.message}, starting with empty history:`, err.cause);
    }
    return new HistoryStore(filePath, record);
  }

  markChapterRead(bookId: string, chapterIndex: number): void {
    const key = chapterKey(bookId, chapterIndex);
    if (this.readKeys.has(key)) return;
    this.readKeys.add(key);
    this.record.chaptersRead.push({ bookId, chapterIndex });
    this.scheduleSave();
  }

  addVersesRead(count: number): void {
    if (!(count > 0)) return;
    this.record.totalVersesRead += Math.floor(count);
    this.scheduleSave();
  }

  addReadingTime(seconds: number): void {
    if (!(seconds > 0) || !Number.isFinite(seconds)) return;
    this.record.totalTimeReadingSeconds += seconds;
    this.scheduleSave();
  }

  isChapterRead(bookId: string, chapterIndex: number): boolean {
    return this.readKeys.has(chapterKey(bookId, chapterIndex));
  }

  chaptersReadForBook(bookId: string): number[] {
    return this.record.chaptersRead
      .filter(c => c.bookId === bookId)
      .map(c => c.chapterIndex)
      .sort((a, b) => a - b);
  }

  getRecord(): ProgressRecord {
    return {
      chaptersRead: this.record.chaptersRead.map((c): ChapterRef => ({ ...c })),
      totalVersesRead: this.record.totalVersesRead,
      totalTimeReadingSeconds: this.record.totalTimeReadingSeconds,
    };
  }

  getStats(totalChapters: number): ReadingStats {
    const totalTimeSeconds = Math.floor(this.record.totalTimeReadingSeconds);
    const chaptersRead = this.record.chaptersRead.length;
    return {
      chaptersRead,
      totalChapters,
      totalVersesRead: this.record.totalVersesRead,
      totalTimeSeconds,
      hours: Math.floor(totalTimeSeconds / 3600),
      minutes: Math.floor((totalTimeSeconds % 3600) / 60),
      progressPercent: totalChapters > 0 ? Math.round((chaptersRead / totalChapters) * 1000) / 10 : 0,
    };
  }

  // Explicit user reset; the only way counters go down
  clear(): void {
    this.record = { chaptersRead: [], totalVersesRead: 0, totalTimeReadingSeconds: 0 };
    this.readKeys.clear();
    this.dirty = true;
    this.flush();
  }

  isDirty(): boolean {
    return this.dirty;
  }

  // Writes pending changes now instead of waiting for the debounce
  flush(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    this.saveSync();
  }

  private scheduleSave(): void {
    this.dirty = true;
    // Frames can arrive faster than the delay; keep the first timer instead of resetting it
    if (this.saveTimer) return;
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      this.saveSync();
    }, SAVE_DEBOUNCE_MS);
  }

  private saveSync(): void {
    if (!this.dirty) return;
    try {
      writeJsonDocument(this.filePath, toHistoryDocument(this.record));
      this.dirty = false;
    } catch (err) {
      if (!(err instanceof PersistenceWriteError)) throw err;
      console.warn(`${err.message}, will retry on next checkpoint:`, err.cause);
    }
  }
}
