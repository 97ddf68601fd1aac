import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { HistoryStore, parseHistoryDocument } from './history-store';

function readDocument(file: string) {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

describe('parseHistoryDocument', () => {
  it('drops duplicate and malformed chapter entries', () => {
    const record = parseHistoryDocument({
      chapters_read: [
        { book: 'gn', chapter: 0 },
        { book: 'gn', chapter: 0 },
        { book: 'ex', chapter: -1 },
        { book: 3, chapter: 1 },
        { book: 'jo', chapter: 2 },
      ],
      total_verses_read: 12.7,
      total_time_reading: -5,
    });

    expect(record).toEqual({
      chaptersRead: [
        { bookId: 'gn', chapterIndex: 0 },
        { bookId: 'jo', chapterIndex: 2 },
      ],
      totalVersesRead: 12,
      totalTimeReadingSeconds: 0,
    });
  });
});

describe('HistoryStore', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    vi.useFakeTimers();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'versepace-history-'));
    file = path.join(dir, 'history.json');
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('records a chapter once', () => {
    const store = HistoryStore.load(file);
    store.markChapterRead('gn', 0);
    store.markChapterRead('gn', 0);
    store.markChapterRead('gn', 2);

    expect(store.getRecord().chaptersRead).toHaveLength(2);
    expect(store.isChapterRead('gn', 2)).toBe(true);
    expect(store.chaptersReadForBook('gn')).toEqual([0, 2]);
  });

  it('ignores non-positive increments', () => {
    const store = HistoryStore.load(file);
    store.addVersesRead(0);
    store.addReadingTime(-1);
    store.addReadingTime(Number.NaN);

    expect(store.getRecord()).toEqual({ chaptersRead: [], totalVersesRead: 0, totalTimeReadingSeconds: 0 });
    expect(store.isDirty()).toBe(false);
  });

  it('batches writes behind a short delay', () => {
    const store = HistoryStore.load(file);
    store.addVersesRead(1);
    store.addReadingTime(2.5);

    expect(fs.existsSync(file)).toBe(false);
    vi.advanceTimersByTime(100);

    expect(readDocument(file)).toEqual({ chapters_read: [], total_verses_read: 1, total_time_reading: 2.5 });
    expect(store.isDirty()).toBe(false);
  });

  it('does not push the write back while updates keep arriving', () => {
    const store = HistoryStore.load(file);
    store.addReadingTime(1);
    vi.advanceTimersByTime(60);
    store.addReadingTime(1);
    vi.advanceTimersByTime(40);

    expect(readDocument(file).total_time_reading).toBe(2);
  });

  it('flushes pending changes on demand and reloads them', () => {
    const store = HistoryStore.load(file);
    store.markChapterRead('ex', 4);
    store.addVersesRead(3);
    store.flush();

    expect(vi.getTimerCount()).toBe(0);
    const reloaded = HistoryStore.load(file);
    expect(reloaded.isChapterRead('ex', 4)).toBe(true);
    expect(reloaded.getRecord().totalVersesRead).toBe(3);
  });

  it('computes dashboard stats', () => {
    const store = HistoryStore.load(file);
    store.markChapterRead('gn', 0);
    store.markChapterRead('gn', 1);
    store.markChapterRead('gn', 2);
    store.addReadingTime(3725.9);

    expect(store.getStats(1189)).toEqual({
      chaptersRead: 3,
      totalChapters: 1189,
      totalVersesRead: 0,
      totalTimeSeconds: 3725,
      hours: 1,
      minutes: 2,
      progressPercent: 0.3,
    });
    expect(store.getStats(0).progressPercent).toBe(0);
  });

  it('clears everything and writes immediately', () => {
    const store = HistoryStore.load(file);
    store.markChapterRead('gn', 0);
    store.addVersesRead(10);
    store.clear();

    expect(readDocument(file)).toEqual({ chapters_read: [], total_verses_read: 0, total_time_reading: 0 });
    expect(store.isChapterRead('gn', 0)).toBe(false);
  });
});
