import * as fs from 'fs';
import * as path from 'path';
import type { Position, Translation } from '../types';
import { CorpusLoadError } from '../errors';
import { bookDisplayName } from './book-names';

export interface CorpusBook {
  abbrev: string;
  chapters: string[][];
}

export interface BookSummary {
  index: number;
  abbrev: string;
  name: string;
  chapters: number;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isCorpusBook(value: unknown): value is CorpusBook {
  if (!value || typeof value !== 'object') return false;
  if (!('abbrev' in value) || typeof value.abbrev !== 'string') return false;
  if (!('chapters' in value) || !Array.isArray(value.chapters)) return false;
  return value.chapters.every(isStringArray);
}

/**
 * Read-only view over one translation: books → chapters → verses.
 * Indices are zero-based everywhere; only `reference()` renders them 1-based.
 */
export class Corpus {
  readonly translation: Translation;
  private readonly books: readonly CorpusBook[];

  constructor(translation: Translation, books: CorpusBook[]) {
    this.translation = translation;
    this.books = books.map(b => ({ abbrev: b.abbrev, chapters: b.chapters.map(c => [...c]) }));
  }

  static fromJSON(translation: Translation, content: string): Corpus {
    let parsed: unknown;
    try {
      // Some exports carry a UTF-8 BOM
      parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
    } catch (err) {
      throw new CorpusLoadError(`Corpus "${translation}" is not valid JSON`, { cause: err });
    }

    if (!Array.isArray(parsed) || parsed.length === 0) {
      throw new CorpusLoadError(`Corpus "${translation}" must be a non-empty array of books`);
    }

    const books: CorpusBook[] = [];
    for (const [index, entry] of parsed.entries()) {
      if (!isCorpusBook(entry)) {
        throw new CorpusLoadError(`Corpus "${translation}" has a malformed book at index ${index}`);
      }
      if (entry.chapters.length === 0 || entry.chapters.some(c => c.length === 0)) {
        throw new CorpusLoadError(`Corpus "${translation}" book "${entry.abbrev}" has an empty chapter list or chapter`);
      }
      books.push(entry);
    }

    return new Corpus(translation, books);
  }

  bookCount(): number {
    return this.books.length;
  }

  bookLength(bookIndex: number): number {
    return this.books[bookIndex]?.chapters.length ?? 0;
  }

  chapterLength(bookIndex: number, chapterIndex: number): number {
    return this.books[bookIndex]?.chapters[chapterIndex]?.length ?? 0;
  }

  getVerse(bookIndex: number, chapterIndex: number, verseIndex: number): string {
    return this.books[bookIndex]?.chapters[chapterIndex]?.[verseIndex] ?? '';
  }

  getChapter(bookIndex: number, chapterIndex: number): string[] {
    return [...(this.books[bookIndex]?.chapters[chapterIndex] ?? [])];
  }

  bookId(bookIndex: number): string {
    return this.books[bookIndex]?.abbrev ?? '';
  }

  bookName(bookIndex: number): string {
    const book = this.books[bookIndex];
    return book ? bookDisplayName(book.abbrev) : '';
  }

  reference({ bookIndex, chapterIndex, verseIndex }: Position): string {
    return `${this.bookName(bookIndex)} ${chapterIndex + 1}:${verseIndex + 1}`;
  }

  isValid({ bookIndex, chapterIndex, verseIndex }: Position): boolean {
    return (
      Number.isInteger(bookIndex) &&
      Number.isInteger(chapterIndex) &&
      Number.isInteger(verseIndex) &&
      verseIndex >= 0 &&
      verseIndex < this.chapterLength(bookIndex, chapterIndex)
    );
  }

  // null at the last verse of the last book
  next(position: Position): Position | null {
    const { bookIndex, chapterIndex, verseIndex } = position;

    if (verseIndex + 1 < this.chapterLength(bookIndex, chapterIndex)) {
      return { bookIndex, chapterIndex, verseIndex: verseIndex + 1 };
    }

    if (chapterIndex + 1 < this.bookLength(bookIndex)) {
      return { bookIndex, chapterIndex: chapterIndex + 1, verseIndex: 0 };
    }

    if (bookIndex + 1 < this.books.length) {
      return { bookIndex: bookIndex + 1, chapterIndex: 0, verseIndex: 0 };
    }

    return null;
  }

  // null at the first verse of the first book
  previous(position: Position): Position | null {
    const { bookIndex, chapterIndex, verseIndex } = position;

    if (verseIndex > 0) {
      return { bookIndex, chapterIndex, verseIndex: verseIndex - 1 };
    }

    if (chapterIndex > 0) {
      const prevChapter = chapterIndex - 1;
      return {
        bookIndex,
        chapterIndex: prevChapter,
        verseIndex: this.chapterLength(bookIndex, prevChapter) - 1,
      };
    }

    if (bookIndex > 0) {
      const prevBook = bookIndex - 1;
      const lastChapter = this.bookLength(prevBook) - 1;
      return {
        bookIndex: prevBook,
        chapterIndex: lastChapter,
        verseIndex: this.chapterLength(prevBook, lastChapter) - 1,
      };
    }

    return null;
  }

  listBooks(): BookSummary[] {
    return this.books.map((book, index) => ({
      index,
      abbrev: book.abbrev,
      name: bookDisplayName(book.abbrev),
      chapters: book.chapters.length,
    }));
  }

  totalChapters(): number {
    return this.books.reduce((sum, book) => sum + book.chapters.length, 0);
  }
}

export function corpusFilePath(corpusDir: string, translation: Translation): string {
  return path.join(corpusDir, `${translation}.json`);
}

export function loadCorpus(corpusDir: string, translation: Translation): Corpus {
  const filePath = corpusFilePath(corpusDir, translation);

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new CorpusLoadError(`Corpus file not readable: ${filePath}`, { cause: err });
  }

  const corpus = Corpus.fromJSON(translation, content);
  console.log(`Loaded ${translation} corpus: ${corpus.bookCount()} books, ${corpus.totalChapters()} chapters`);
  return corpus;
}
