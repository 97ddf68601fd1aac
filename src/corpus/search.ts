import type { Position } from '../types';
import type { Corpus } from './corpus';
import { getBookNames } from './book-names';

export interface SearchHit {
  position: Position;
  text: string;
  reference: string;
  highlight: string;
}

export interface SearchOptions {
  maxResults?: number;
  caseSensitive?: boolean;
}

export interface ReferenceMatch {
  position: Position;
  text: string;
  reference: string;
}

export const DEFAULT_MAX_RESULTS = 100;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Substring search in corpus order; matches are wrapped in **…**
export function searchText(corpus: Corpus, query: string, options: SearchOptions = {}): SearchHit[] {
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  const caseSensitive = options.caseSensitive ?? false;
  if (query.trim().length === 0 || maxResults <= 0) return [];

  const needle = caseSensitive ? query : query.toLowerCase();
  const pattern = new RegExp(escapeRegExp(query), caseSensitive ? 'g' : 'gi');
  const hits: SearchHit[] = [];

  for (let b = 0; b < corpus.bookCount(); b++) {
    for (let c = 0; c < corpus.bookLength(b); c++) {
      const verses = corpus.getChapter(b, c);
      for (let v = 0; v < verses.length; v++) {
        const text = verses[v];
        const haystack = caseSensitive ? text : text.toLowerCase();
        if (!haystack.includes(needle)) continue;

        const position = { bookIndex: b, chapterIndex: c, verseIndex: v };
        hits.push({
          position,
          text,
          reference: corpus.reference(position),
          highlight: text.replace(pattern, match => `**${match}**`),
        });
        if (hits.length >= maxResults) return hits;
      }
    }
  }

  return hits;
}

// Book by exact abbreviation, then full name, then name prefix
export function findBookIndex(corpus: Corpus, name: string): number | null {
  const wanted = name.trim().toLowerCase();
  if (wanted.length === 0) return null;

  const books = corpus.listBooks();
  const byAbbrev = books.find(b => b.abbrev.toLowerCase() === wanted);
  if (byAbbrev) return byAbbrev.index;

  const abbrevsByName = [...getBookNames()].map(([abbrev, full]) => ({ abbrev, full: full.toLowerCase() }));
  const indexOf = (abbrev: string) => books.find(b => b.abbrev.toLowerCase() === abbrev)?.index ?? null;

  for (const { abbrev, full } of abbrevsByName) {
    if (full === wanted) {
      const index = indexOf(abbrev);
      if (index !== null) return index;
    }
  }

  for (const { abbrev, full } of abbrevsByName) {
    if (full.startsWith(wanted)) {
      const index = indexOf(abbrev);
      if (index !== null) return index;
    }
  }

  return null;
}

const REFERENCE_PATTERN = /^(\d?\s*[\p{L}]+)\s+(\d+)(?::(\d+))?$/u;

// "João 3:16", "1 João 2", "gn 1:1"; chapter and verse numbers are 1-based
export function findReference(corpus: Corpus, reference: string): ReferenceMatch | null {
  const match = REFERENCE_PATTERN.exec(reference.trim());
  if (!match) return null;

  const [, bookName, chapterText, verseText] = match;
  const bookIndex = findBookIndex(corpus, bookName);
  if (bookIndex === null) return null;

  const position = {
    bookIndex,
    chapterIndex: parseInt(chapterText, 10) - 1,
    verseIndex: verseText === undefined ? 0 : parseInt(verseText, 10) - 1,
  };
  if (!corpus.isValid(position)) return null;

  return {
    position,
    text: corpus.getVerse(position.bookIndex, position.chapterIndex, position.verseIndex),
    reference: corpus.reference(position),
  };
}
