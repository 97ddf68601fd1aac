import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DB } from './db';

const JOHN_3_16 = { bookIndex: 42, chapterIndex: 2, verseIndex: 15 };
const GEN_1_1 = { bookIndex: 0, chapterIndex: 0, verseIndex: 0 };

describe('DB favorites', () => {
  let dir: string;
  let dbPath: string;
  let db: DB;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'versepace-db-'));
    dbPath = path.join(dir, 'versepace.db');
    db = await DB.open(dbPath);
  });

  afterEach(() => {
    db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('adds a verse once', () => {
    expect(db.addFavorite(JOHN_3_16, 'Porque Deus amou o mundo', 'João 3:16')).toBe(true);
    expect(db.addFavorite(JOHN_3_16, 'Porque Deus amou o mundo', 'João 3:16')).toBe(false);
    expect(db.countFavorites()).toBe(1);

    const favorite = db.getFavorite(JOHN_3_16);
    expect(favorite).toMatchObject({
      book_index: 42,
      chapter_index: 2,
      verse_index: 15,
      verse_text: 'Porque Deus amou o mundo',
      reference: 'João 3:16',
      note: null,
    });
  });

  it('lists newest first', () => {
    db.addFavorite(GEN_1_1, 'No princípio', 'Gênesis 1:1');
    db.addFavorite(JOHN_3_16, 'Porque Deus amou o mundo', 'João 3:16', 'memorizar');

    expect(db.getFavorites().map(f => f.reference)).toEqual(['João 3:16', 'Gênesis 1:1']);
  });

  it('removes and updates notes only for existing favorites', () => {
    db.addFavorite(GEN_1_1, 'No princípio', 'Gênesis 1:1');

    expect(db.updateFavoriteNote(GEN_1_1, 'início')).toBe(true);
    expect(db.getFavorite(GEN_1_1)?.note).toBe('início');
    expect(db.updateFavoriteNote(JOHN_3_16, 'x')).toBe(false);

    expect(db.removeFavorite(JOHN_3_16)).toBe(false);
    expect(db.removeFavorite(GEN_1_1)).toBe(true);
    expect(db.isFavorite(GEN_1_1)).toBe(false);
  });

  it('persists to disk on close', async () => {
    db.addFavorite(GEN_1_1, 'No princípio', 'Gênesis 1:1');
    db.close();

    db = await DB.open(dbPath);
    expect(db.isFavorite(GEN_1_1)).toBe(true);
  });
});
