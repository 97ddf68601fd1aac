import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CorpusLoadError } from '../errors';
import { Corpus, loadCorpus } from './corpus';

const BOOKS = [
  { abbrev: 'gn', chapters: [['In the beginning', 'And the earth'], ['Thus the heavens']] },
  { abbrev: 'ex', chapters: [['Now these are the names']] },
  { abbrev: 'zz', chapters: [['Unnamed book verse']] },
];

describe('Corpus', () => {
  const corpus = new Corpus('acf', BOOKS);

  it('reports sizes and verses', () => {
    expect(corpus.bookCount()).toBe(3);
    expect(corpus.bookLength(0)).toBe(2);
    expect(corpus.chapterLength(0, 0)).toBe(2);
    expect(corpus.chapterLength(7, 0)).toBe(0);
    expect(corpus.getVerse(0, 1, 0)).toBe('Thus the heavens');
    expect(corpus.getVerse(0, 1, 5)).toBe('');
    expect(corpus.totalChapters()).toBe(4);
  });

  it('names books from the lookup table and falls back to the abbreviation', () => {
    expect(corpus.bookName(1)).toBe('Êxodo');
    expect(corpus.bookName(2)).toBe('ZZ');
    expect(corpus.reference({ bookIndex: 0, chapterIndex: 1, verseIndex: 0 })).toBe('Gênesis 2:1');
    expect(corpus.listBooks()[0]).toEqual({ index: 0, abbrev: 'gn', name: 'Gênesis', chapters: 2 });
  });

  it('validates positions', () => {
    expect(corpus.isValid({ bookIndex: 0, chapterIndex: 0, verseIndex: 1 })).toBe(true);
    expect(corpus.isValid({ bookIndex: 0, chapterIndex: 0, verseIndex: 2 })).toBe(false);
    expect(corpus.isValid({ bookIndex: -1, chapterIndex: 0, verseIndex: 0 })).toBe(false);
    expect(corpus.isValid({ bookIndex: 0, chapterIndex: 0.5, verseIndex: 0 })).toBe(false);
  });

  it('walks forward and backward across chapter and book boundaries', () => {
    expect(corpus.next({ bookIndex: 0, chapterIndex: 0, verseIndex: 1 })).toEqual({ bookIndex: 0, chapterIndex: 1, verseIndex: 0 });
    expect(corpus.next({ bookIndex: 0, chapterIndex: 1, verseIndex: 0 })).toEqual({ bookIndex: 1, chapterIndex: 0, verseIndex: 0 });
    expect(corpus.next({ bookIndex: 2, chapterIndex: 0, verseIndex: 0 })).toBeNull();

    expect(corpus.previous({ bookIndex: 1, chapterIndex: 0, verseIndex: 0 })).toEqual({ bookIndex: 0, chapterIndex: 1, verseIndex: 0 });
    expect(corpus.previous({ bookIndex: 0, chapterIndex: 1, verseIndex: 0 })).toEqual({ bookIndex: 0, chapterIndex: 0, verseIndex: 1 });
    expect(corpus.previous({ bookIndex: 0, chapterIndex: 0, verseIndex: 0 })).toBeNull();
  });

  it('does not share chapter arrays with callers', () => {
    const chapter = corpus.getChapter(0, 0);
    chapter.push('extra');
    expect(corpus.chapterLength(0, 0)).toBe(2);
  });
});

describe('Corpus.fromJSON', () => {
  it('accepts a leading byte order mark', () => {
    const corpus = Corpus.fromJSON('nvi', `\uFEFF${JSON.stringify(BOOKS)}`);
    expect(corpus.translation).toBe('nvi');
    expect(corpus.bookCount()).toBe(3);
  });

  it.each([
    ['invalid JSON', '{"abbrev":'],
    ['an empty list', '[]'],
    ['an object', '{"books": []}'],
    ['a book without chapters', '[{"abbrev": "gn"}]'],
    ['a non-string verse', '[{"abbrev": "gn", "chapters": [[1, 2]]}]'],
    ['an empty chapter', '[{"abbrev": "gn", "chapters": [[]]}]'],
  ])('rejects %s', (_label, content) => {
    expect(() => Corpus.fromJSON('acf', content)).toThrow(CorpusLoadError);
  });
});

describe('loadCorpus', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'versepace-corpus-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads <translation>.json from the corpus directory', () => {
    fs.writeFileSync(path.join(dir, 'acf.json'), JSON.stringify(BOOKS));
    const corpus = loadCorpus(dir, 'acf');
    expect(corpus.getVerse(1, 0, 0)).toBe('Now these are the names');
  });

  it('fails with CorpusLoadError when the file is missing', () => {
    expect(() => loadCorpus(dir, 'nvi')).toThrow(CorpusLoadError);
  });
});
