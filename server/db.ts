import initSqlJs, { Database as SqlJsDatabase } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import type { Position } from '../src/types';
import type { AppConfig } from './config';

export interface FavoriteRecord {
  id: number;
  book_index: number;
  chapter_index: number;
  verse_index: number;
  verse_text: string;
  reference: string;
  note: string | null;
  created_at: number;
}

const SCHEMA = `
-- Favorite verses (one row per verse)
CREATE TABLE IF NOT EXISTS favorites (
  id INTEGER PRIMARY KEY,
  book_index INTEGER NOT NULL,
  chapter_index INTEGER NOT NULL,
  verse_index INTEGER NOT NULL,
  verse_text TEXT NOT NULL,
  reference TEXT NOT NULL,
  note TEXT,
  created_at INTEGER NOT NULL,
  UNIQUE (book_index, chapter_index, verse_index)
);

CREATE INDEX IF NOT EXISTS idx_favorites_created ON favorites(created_at);
`;

function isFavoriteRecord(row: Record<string, unknown>): row is FavoriteRecord & Record<string, unknown> {
  return (
    typeof row.id === 'number' &&
    typeof row.book_index === 'number' &&
    typeof row.chapter_index === 'number' &&
    typeof row.verse_index === 'number' &&
    typeof row.verse_text === 'string' &&
    typeof row.reference === 'string' &&
    (row.note === null || typeof row.note === 'string') &&
    typeof row.created_at === 'number'
  );
}

export class DB {
  private db!: SqlJsDatabase;
  private dbPath: string;
  private saveTimer: ReturnType<typeof setTimeout> | null = null;

  private constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  static async create(config: AppConfig): Promise<DB> {
    return DB.open(config.storage.dbPath);
  }

  static async open(dbPath: string): Promise<DB> {
    const instance = new DB(dbPath);
    await instance.init();
    return instance;
  }

  private async init(): Promise<void> {
    const SQL = await initSqlJs();

    // Load existing database or create new one
    if (fs.existsSync(this.dbPath)) {
      const buffer = fs.readFileSync(this.dbPath);
      this.db = new SQL.Database(buffer);
    } else {
      this.db = new SQL.Database();
    }

    this.db.run(SCHEMA);
    this.save();
  }

  private save(): void {
    // Debounce saves to avoid excessive disk writes
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
    }
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      this.saveSync();
    }, 100);
  }

  private saveSync(): void {
    const data = this.db.export();
    const buffer = Buffer.from(data);
    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    try {
      fs.writeFileSync(this.dbPath, buffer);
    } catch (err) {
      console.warn(`Failed to write ${this.dbPath}:`, err);
    }
  }

  private queryFavorites(sql: string, params: (string | number)[] = []): FavoriteRecord[] {
    const results: FavoriteRecord[] = [];
    const stmt = this.db.prepare(sql);
    stmt.bind(params);
    while (stmt.step()) {
      const row = stmt.getAsObject();
      if (isFavoriteRecord(row)) {
        results.push(row);
      }
    }
    stmt.free();
    return results;
  }

  // false when the verse is already a favorite
  addFavorite(position: Position, verseText: string, reference: string, note?: string): boolean {
    if (this.isFavorite(position)) return false;

    this.db.run(
      `INSERT INTO favorites (book_index, chapter_index, verse_index, verse_text, reference, note, created_at) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [position.bookIndex, position.chapterIndex, position.verseIndex, verseText, reference, note ?? null, Date.now()]
    );
    this.save();
    return true;
  }

  removeFavorite({ bookIndex, chapterIndex, verseIndex }: Position): boolean {
    this.db.run(
      'DELETE FROM favorites WHERE book_index = ? AND chapter_index = ? AND verse_index = ?',
      [bookIndex, chapterIndex, verseIndex]
    );
    const removed = this.db.getRowsModified() > 0;
    if (removed) this.save();
    return removed;
  }

  isFavorite(position: Position): boolean {
    return this.getFavorite(position) !== undefined;
  }

  getFavorite({ bookIndex, chapterIndex, verseIndex }: Position): FavoriteRecord | undefined {
    return this.queryFavorites(
      'SELECT * FROM favorites WHERE book_index = ? AND chapter_index = ? AND verse_index = ?',
      [bookIndex, chapterIndex, verseIndex]
    )[0];
  }

  getFavorites(): FavoriteRecord[] {
    return this.queryFavorites('SELECT * FROM favorites ORDER BY created_at DESC, id DESC');
  }

  updateFavoriteNote({ bookIndex, chapterIndex, verseIndex }: Position, note: string): boolean {
    this.db.run(
      'UPDATE favorites SET note = ? WHERE book_index = ? AND chapter_index = ? AND verse_index = ?',
      [note, bookIndex, chapterIndex, verseIndex]
    );
    const updated = this.db.getRowsModified() > 0;
    if (updated) this.save();
    return updated;
  }

  countFavorites(): number {
    const stmt = this.db.prepare('SELECT COUNT(*) AS count FROM favorites');
    stmt.step();
    const { count } = stmt.getAsObject();
    stmt.free();
    return typeof count === 'number' ? count : 0;
  }

  close(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    this.saveSync();
    this.db.close();
  }
}
